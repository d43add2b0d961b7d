import { spawn } from 'child_process';
import type { LaunchResult } from './interface';

/**
 * Splits a command-line string on whitespace, honouring double quotes.
 * `a "b c" d` → ['a', 'b c', 'd'].
 */
export function splitCommandLine(value: string): string[] {
  const args: string[] = [];
  let current = '';
  let inQuotes = false;
  let hasToken = false;

  for (const ch of String(value || '')) {
    if (ch === '"') {
      inQuotes = !inQuotes;
      hasToken = true;
      continue;
    }
    if (!inQuotes && /\s/.test(ch)) {
      if (hasToken) args.push(current);
      current = '';
      hasToken = false;
      continue;
    }
    current += ch;
    hasToken = true;
  }
  if (hasToken) args.push(current);
  return args;
}

/**
 * Spawns a detached child and resolves once the OS has either started it or
 * refused to. The child is unref'd so it outlives the toolbar.
 */
export function spawnDetached(
  command: string,
  args: string[],
  workingDirectory: string
): Promise<LaunchResult> {
  return new Promise((resolve) => {
    try {
      const child = spawn(command, args, {
        cwd: workingDirectory || undefined,
        detached: true,
        stdio: 'ignore',
      });
      child.once('error', (e) => {
        console.error('Failed to launch application:', command, e);
        resolve({ ok: false, error: e.message });
      });
      child.once('spawn', () => {
        child.unref();
        resolve({ ok: true });
      });
    } catch (e) {
      console.error('Failed to launch application:', command, e);
      resolve({ ok: false, error: e instanceof Error ? e.message : String(e) });
    }
  });
}
