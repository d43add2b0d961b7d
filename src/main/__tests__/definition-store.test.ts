import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { WorkspaceDefinitionStore } from '../workspaces/definition-store';
import { createApplicationDefinition, type WorkspaceDefinition } from '../workspaces/types';

function workspace(id: string, name: string, fields: Partial<WorkspaceDefinition> = {}): WorkspaceDefinition {
  return {
    id,
    name,
    creationTime: 1_700_000_000,
    lastLaunchedTime: 0,
    moveExistingWindows: true,
    applications: [],
    monitors: [],
    ...fields,
  };
}

let tempDir = '';
let filePath = '';

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'definition-store-test-'));
  filePath = path.join(tempDir, 'workspaces', 'workspaces.json');
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('WorkspaceDefinitionStore', () => {
  it('treats a missing file as an empty list', async () => {
    const store = new WorkspaceDefinitionStore(filePath);

    expect(await store.loadAll()).toEqual([]);
    expect(await store.loadById('anything')).toBeNull();
  });

  it('round-trips a saved workspace through the file', async () => {
    const store = new WorkspaceDefinitionStore(filePath);
    const saved = workspace('ws-1', 'Writing', {
      applications: [
        createApplicationDefinition({
          id: 'app-1',
          name: 'Notes.exe',
          path: 'C:\\Apps\\Notes.exe',
          title: 'Draft',
          monitorIndex: 1,
          maximized: true,
          position: { left: 10, top: 20, width: 800, height: 600 },
        }),
      ],
      monitors: [{ id: 'm1', instanceId: 'DISPLAY1', number: 1, dpi: 144, rect: { left: 0, top: 0, width: 2560, height: 1440 } }],
    });

    await store.saveWorkspace(saved);

    expect(await store.loadAll()).toEqual([saved]);
    expect(await store.loadById('WS-1')).toEqual(saved);
    const onDisk = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    expect(onDisk.workspaces[0].id).toBe('ws-1');
    expect(fs.readdirSync(path.dirname(filePath))).toEqual(['workspaces.json']);
  });

  it('replaces workspaces with the same id or name and puts the newest first', async () => {
    const store = new WorkspaceDefinitionStore(filePath);
    await store.saveWorkspace(workspace('a', 'Work'));
    await store.saveWorkspace(workspace('b', 'Home'));
    await store.saveWorkspace(workspace('c', ' work '));
    await store.saveWorkspace(workspace('B', 'Home again'));

    const ids = (await store.loadAll()).map((ws) => ws.id);
    expect(ids).toEqual(['B', 'c']);
  });

  it('requires a workspace id', async () => {
    const store = new WorkspaceDefinitionStore(filePath);
    await expect(store.saveWorkspace(workspace('  ', 'Nameless'))).rejects.toThrow('Workspace id is required.');
  });

  it('deletes by id', async () => {
    const store = new WorkspaceDefinitionStore(filePath);
    await store.saveAll([workspace('a', 'One'), workspace('b', 'Two')]);

    expect(await store.deleteWorkspace('A')).toBe(true);
    expect(await store.deleteWorkspace('a')).toBe(false);
    expect((await store.loadAll()).map((ws) => ws.id)).toEqual(['b']);
  });

  it('stamps the last launched time', async () => {
    const store = new WorkspaceDefinitionStore(filePath);
    await store.saveAll([workspace('a', 'One')]);

    expect(await store.updateLastLaunchedTime('a', 1_800_000_000)).toBe(true);
    expect(await store.updateLastLaunchedTime('missing', 1_800_000_000)).toBe(false);
    expect((await store.loadById('a'))?.lastLaunchedTime).toBe(1_800_000_000);
  });

  it('logs and ignores a malformed file', async () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, '{not json', 'utf-8');
    const store = new WorkspaceDefinitionStore(filePath);

    expect(await store.loadAll()).toEqual([]);
    expect(console.error).toHaveBeenCalledWith('Failed to load workspace definitions:', filePath, expect.any(SyntaxError));
  });

  it('accepts a bare array and drops entries without an id', async () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(
      filePath,
      JSON.stringify([{ id: 'kept', name: 'Kept', applications: [{ path: 'C:\\a.exe' }, 'junk'] }, { name: 'No id' }]),
      'utf-8'
    );
    const store = new WorkspaceDefinitionStore(filePath);

    const all = await store.loadAll();

    expect(all).toHaveLength(1);
    expect(all[0].id).toBe('kept');
    expect(all[0].moveExistingWindows).toBe(false);
    expect(all[0].applications).toEqual([createApplicationDefinition({ path: 'C:\\a.exe' })]);
  });

  it('keeps both writes when two saves race', async () => {
    const store = new WorkspaceDefinitionStore(filePath);
    const other = new WorkspaceDefinitionStore(filePath);

    await Promise.all([store.saveWorkspace(workspace('a', 'One')), other.saveWorkspace(workspace('b', 'Two'))]);

    const ids = (await store.loadAll()).map((ws) => ws.id).sort();
    expect(ids).toEqual(['a', 'b']);
  });

  it('hands out copies', async () => {
    const store = new WorkspaceDefinitionStore(filePath);
    await store.saveWorkspace(workspace('a', 'One'));

    const first = await store.loadAll();
    first[0].name = 'Mutated';

    expect((await store.loadAll())[0].name).toBe('One');
  });
});
