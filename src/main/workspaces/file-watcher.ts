import * as fs from 'fs';
import * as path from 'path';

/**
 * Watches the directories holding `files` and calls `onChange` for events
 * touching one of them. Returns a function that stops every watcher.
 */
export function watchFiles(files: string[], onChange: (file: string) => void): () => void {
  const byDirectory = new Map<string, Set<string>>();
  for (const file of files) {
    const directory = path.dirname(file);
    const names = byDirectory.get(directory) ?? new Set<string>();
    names.add(path.basename(file).toLowerCase());
    byDirectory.set(directory, names);
  }

  const watchers: fs.FSWatcher[] = [];
  for (const [directory, names] of byDirectory) {
    try {
      fs.mkdirSync(directory, { recursive: true });
      const watcher = fs.watch(directory, (_event, filename) => {
        const name = filename ? String(filename).toLowerCase() : '';
        // Some platforms omit the name; treat that as a possible change.
        if (name && !names.has(name)) return;
        onChange(name ? path.join(directory, name) : directory);
      });
      watcher.on('error', (e) => {
        console.warn(`[Workspaces] Watcher error for ${directory}:`, e);
      });
      watchers.push(watcher);
    } catch (e) {
      console.warn(`[Workspaces] Could not watch ${directory}:`, e);
    }
  }

  return () => {
    for (const watcher of watchers) watcher.close();
  };
}
