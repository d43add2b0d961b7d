import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { WorkspaceDefinitionStore } from '../workspaces/definition-store';
import { WorkspaceLauncher, resolveLaunchTarget } from '../workspaces/launcher';
import { ManagedWindowRegistry } from '../workspaces/managed-window-registry';
import { createApplicationDefinition, type ApplicationDefinition } from '../workspaces/types';
import { createWindowMatcher } from '../workspaces/window-matcher';
import { FakeDesktop, desktopWindow } from './desktop-fakes';

const notesApp = createApplicationDefinition({
  id: 'a1',
  name: 'Notes.exe',
  path: 'C:\\Apps\\Notes.exe',
  title: 'Draft',
});

const playerApp = createApplicationDefinition({
  id: 'a2',
  name: 'Player.exe',
  path: 'C:\\Apps\\Player.exe',
  commandLineArguments: '--minimized',
  workingDirectory: 'C:\\Music',
});

const notesWindow = desktopWindow({
  handle: 'h1',
  processId: 200,
  title: 'Draft',
  processPath: 'C:\\Apps\\Notes.exe',
  processFileName: 'Notes.exe',
});

const playerWindow = desktopWindow({
  handle: 'h2',
  processId: 300,
  title: 'Music',
  processPath: 'C:\\Apps\\Player.exe',
  processFileName: 'Player.exe',
});

let tempDir = '';
let desktop: FakeDesktop;
let definitions: WorkspaceDefinitionStore;
let registry: ManagedWindowRegistry;

function createLauncher(windowTimeoutMs = 0) {
  let counter = 0;
  return new WorkspaceLauncher({
    windows: desktop,
    launcher: desktop,
    definitions,
    registry,
    matcher: createWindowMatcher(),
    windowTimeoutMs,
    pollIntervalMs: 1,
    createId: () => `new-${++counter}`,
  });
}

async function saveWorkspace(applications: ApplicationDefinition[], moveExistingWindows = true) {
  await definitions.saveWorkspace({
    id: 'ws',
    name: 'Writing',
    creationTime: 1,
    lastLaunchedTime: 0,
    moveExistingWindows,
    applications,
    monitors: [],
  });
}

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'launcher-test-'));
  desktop = new FakeDesktop(1);
  definitions = new WorkspaceDefinitionStore(path.join(tempDir, 'workspaces.json'));
  registry = new ManagedWindowRegistry();
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('WorkspaceLauncher', () => {
  it('claims matching windows that are already open', async () => {
    await saveWorkspace([notesApp, playerApp]);
    desktop.windows = [playerWindow, notesWindow];

    const report = await createLauncher().launch('ws');

    expect(report.ok).toBe(true);
    expect(report.message).toBe('Workspace ready.');
    expect(report.apps.map((app) => [app.appId, app.status, app.handle])).toEqual([
      ['a1', 'claimed', 'h1'],
      ['a2', 'claimed', 'h2'],
    ]);
    expect(desktop.launches).toEqual([]);
    expect(registry.getBoundWindow('a1')).toBe('h1');
    expect(registry.getWorkspaceIdForApp('a2')).toBe('ws');
    expect((await definitions.loadById('ws'))?.lastLaunchedTime).toBeGreaterThan(0);
  });

  it('reuses a window that is still bound and still matches', async () => {
    await saveWorkspace([notesApp]);
    desktop.windows = [notesWindow];
    registry.tryBind('ws', 'a1', 'h1');

    const report = await createLauncher().launch('ws');

    expect(report.apps[0].status).toBe('reused');
    expect(report.apps[0].handle).toBe('h1');
  });

  it('drops a stale binding and claims a fresh window', async () => {
    await saveWorkspace([notesApp]);
    desktop.windows = [notesWindow];
    registry.tryBind('ws', 'a1', 'gone');

    const report = await createLauncher().launch('ws');

    expect(report.apps[0].status).toBe('claimed');
    expect(registry.isBound('gone')).toBe(false);
    expect(registry.getBoundWindow('a1')).toBe('h1');
  });

  it('never hands one window to two applications', async () => {
    const secondNotes = createApplicationDefinition({ id: 'a3', name: 'Notes.exe', path: 'C:\\Apps\\Notes.exe' });
    await saveWorkspace([notesApp, secondNotes]);
    desktop.windows = [notesWindow];
    desktop.onLaunch = () => {
      desktop.windows.push({ ...notesWindow, handle: 'h3', title: 'Second' });
      return { ok: true };
    };

    const report = await createLauncher().launch('ws');

    expect(report.apps.map((app) => [app.appId, app.status, app.handle])).toEqual([
      ['a1', 'claimed', 'h1'],
      ['a3', 'launched', 'h3'],
    ]);
  });

  it('launches missing applications and reports partial failure', async () => {
    await saveWorkspace([notesApp, playerApp]);
    desktop.onLaunch = (launch) => {
      if (launch.command === 'C:\\Apps\\Notes.exe') {
        desktop.windows.push({ ...notesWindow, handle: 'h-new' });
        return { ok: true };
      }
      return { ok: false, error: 'Access denied.' };
    };

    const report = await createLauncher().launch('ws');

    expect(desktop.launches).toEqual([
      { command: 'C:\\Apps\\Notes.exe', args: '', workingDirectory: '' },
      { command: 'C:\\Apps\\Player.exe', args: '--minimized', workingDirectory: 'C:\\Music' },
    ]);
    expect(report.ok).toBe(true);
    expect(report.message).toBe('Workspace ready; 1 of 2 applications could not be started.');
    expect(report.apps[0]).toMatchObject({ appId: 'a1', status: 'launched', handle: 'h-new' });
    expect(report.apps[1]).toMatchObject({ appId: 'a2', status: 'failed', handle: null, error: 'Access denied.' });
  });

  it('fails when no window appears before the timeout', async () => {
    await saveWorkspace([notesApp]);

    const report = await createLauncher(0).launch('ws');

    expect(report.ok).toBe(false);
    expect(report.message).toBe('No applications could be started.');
    expect(report.apps[0].error).toBe('Timed out waiting for the application window.');
    expect((await definitions.loadById('ws'))?.lastLaunchedTime).toBe(0);
  });

  it('warns about title-only matches', async () => {
    await saveWorkspace([createApplicationDefinition({ id: 'a4', title: 'Scratch' })]);
    desktop.windows = [desktopWindow({ handle: 'h4', title: 'scratch', processPath: 'C:\\Apps\\Pad.exe' })];

    const report = await createLauncher().launch('ws');

    expect(report.apps[0]).toMatchObject({ status: 'claimed', titleOnly: true });
    expect(console.warn).toHaveBeenCalledWith('[Workspaces] "Scratch" matched on window title only.');
  });

  it('reports unknown and empty workspaces', async () => {
    const missing = await createLauncher().launch('nope');
    expect(missing).toEqual({ workspaceId: 'nope', ok: false, message: 'Workspace "nope" was not found.', apps: [] });

    await saveWorkspace([]);
    const empty = await createLauncher().launch('ws');
    expect(empty).toEqual({
      workspaceId: 'ws',
      ok: false,
      message: 'Workspace has no applications to launch.',
      apps: [],
    });
    expect(console.warn).toHaveBeenCalledWith('[Workspaces] Workspace "ws" has no applications to launch.');
    expect((await definitions.loadById('ws'))?.lastLaunchedTime).toBe(0);
  });

  it('gives applications without an id their own id for the launch', async () => {
    await saveWorkspace([{ ...notesApp, id: '' }, { ...playerApp, id: '' }]);
    desktop.windows = [notesWindow, playerWindow];

    const report = await createLauncher().launch('ws');

    expect(report.ok).toBe(true);
    expect(report.apps.map((app) => [app.appId, app.label, app.status, app.handle])).toEqual([
      ['new-1', 'Notes.exe', 'claimed', 'h1'],
      ['new-2', 'Player.exe', 'claimed', 'h2'],
    ]);
    expect(registry.getBoundWindow('new-1')).toBe('h1');
    expect(registry.getBoundWindow('new-2')).toBe('h2');
    expect(desktop.launches).toEqual([]);
  });

  it('starts every application fresh when existing windows must stay put', async () => {
    await saveWorkspace([notesApp], false);
    desktop.windows = [notesWindow];
    desktop.onLaunch = () => {
      desktop.windows.unshift({ ...notesWindow, handle: 'h-fresh' });
      return { ok: true };
    };

    const report = await createLauncher().launch('ws');

    expect(desktop.launches).toEqual([{ command: 'C:\\Apps\\Notes.exe', args: '', workingDirectory: '' }]);
    expect(report.apps.map((app) => [app.status, app.handle])).toEqual([['launched', 'h-fresh']]);
    expect(registry.getBoundWindow('a1')).toBe('h-fresh');
    expect(registry.isBound('h1')).toBe(false);
  });

  it('stops when cancelled', async () => {
    await saveWorkspace([notesApp]);
    const controller = new AbortController();
    controller.abort();

    await expect(createLauncher().launch('ws', controller.signal)).rejects.toMatchObject({ name: 'AbortError' });
    expect(desktop.launches).toEqual([]);
  });
});

describe('resolveLaunchTarget', () => {
  it('routes packaged apps through AppsFolder', () => {
    const app = createApplicationDefinition({ appUserModelId: 'Contoso.Notes!App', path: 'C:\\Apps\\Notes.exe' });
    expect(resolveLaunchTarget(app)).toEqual({ command: 'shell:AppsFolder\\Contoso.Notes!App', args: '' });
  });

  it('uses the path and arguments for desktop apps', () => {
    expect(resolveLaunchTarget(playerApp)).toEqual({ command: 'C:\\Apps\\Player.exe', args: '--minimized' });
  });

  it('cannot launch frame-host or empty definitions', () => {
    expect(
      resolveLaunchTarget(createApplicationDefinition({ path: 'C:\\Windows\\System32\\ApplicationFrameHost.exe' }))
    ).toBeNull();
    expect(resolveLaunchTarget(createApplicationDefinition({ title: 'Only a title' }))).toBeNull();
  });
});
