import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { WorkspaceButtonStore } from '../workspaces/button-store';
import { WorkspaceDefinitionStore } from '../workspaces/definition-store';
import { ManagedWindowRegistry } from '../workspaces/managed-window-registry';
import {
  WorkspaceSnapshotter,
  resolveMonitorIndex,
  resolveProcessPath,
  shouldCaptureWindow,
} from '../workspaces/snapshotter';
import { createWindowMatcher } from '../workspaces/window-matcher';
import { FakeDesktop, desktopWindow, monitor } from './desktop-fakes';

const FRAME_HOST = 'C:\\Windows\\System32\\ApplicationFrameHost.exe';

let tempDir = '';
let desktop: FakeDesktop;
let definitions: WorkspaceDefinitionStore;
let buttons: WorkspaceButtonStore;
let registry: ManagedWindowRegistry;
let snapshotter: WorkspaceSnapshotter;

const notesWindow = desktopWindow({
  handle: 'h1',
  processId: 200,
  title: 'Draft - Notes',
  processPath: 'C:\\Apps\\Notes.exe',
  processFileName: 'Notes.exe',
  isMaximized: true,
  bounds: { left: 100, top: 100, width: 800, height: 600 },
});

const playerWindow = desktopWindow({
  handle: 'h2',
  processId: 300,
  title: 'Music',
  processPath: 'C:\\Apps\\Player.exe',
  processFileName: 'Player.exe',
  bounds: { left: 2000, top: 50, width: 600, height: 400 },
});

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'snapshotter-test-'));
  desktop = new FakeDesktop(1);
  desktop.monitors = [
    monitor('m0', { left: 0, top: 0, width: 1920, height: 1080 }),
    monitor('m1', { left: 1920, top: 0, width: 1920, height: 1080 }),
  ];
  definitions = new WorkspaceDefinitionStore(path.join(tempDir, 'workspaces.json'));
  buttons = new WorkspaceButtonStore(path.join(tempDir, 'buttons.json'));
  registry = new ManagedWindowRegistry();
  let counter = 0;
  snapshotter = new WorkspaceSnapshotter({
    windows: desktop,
    displays: desktop,
    definitions,
    buttons,
    registry,
    matcher: createWindowMatcher(),
    now: () => 1_750_000_000,
    createId: () => `id-${++counter}`,
  });
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('WorkspaceSnapshotter', () => {
  it('captures qualifying windows, saves the workspace and binds the windows', async () => {
    desktop.windows = [
      notesWindow,
      desktopWindow({ handle: 'tool', processId: 210, title: 'Palette', processPath: 'C:\\a.exe', isToolWindow: true }),
      desktopWindow({ handle: 'tray', processId: 4, title: 'Taskbar', processPath: 'C:\\e.exe', className: 'Shell_TrayWnd' }),
      desktopWindow({ handle: 'hidden', processId: 220, title: 'Hidden', processPath: 'C:\\b.exe', isVisible: false }),
      desktopWindow({ handle: 'self', processId: 1, title: 'Toolbar', processPath: 'C:\\toolbar.exe' }),
      desktopWindow({ handle: 'untitled', processId: 230, title: '  ', processPath: 'C:\\c.exe' }),
      desktopWindow({ handle: 'shell', processId: 5, title: 'Program Manager', processPath: 'C:\\d.exe' }),
      playerWindow,
    ];

    const workspace = await snapshotter.snapshot('  Writing  ');

    expect(workspace).toEqual({
      id: 'id-3',
      name: 'Writing',
      creationTime: 1_750_000_000,
      lastLaunchedTime: 0,
      moveExistingWindows: true,
      applications: [
        {
          id: 'id-1',
          name: 'Notes.exe',
          path: 'C:\\Apps\\Notes.exe',
          title: 'Draft - Notes',
          appUserModelId: '',
          packageFullName: '',
          pwaAppId: '',
          commandLineArguments: '',
          workingDirectory: '',
          monitorIndex: 0,
          minimized: false,
          maximized: true,
          position: { left: 100, top: 100, width: 800, height: 600 },
        },
        {
          id: 'id-2',
          name: 'Player.exe',
          path: 'C:\\Apps\\Player.exe',
          title: 'Music',
          appUserModelId: '',
          packageFullName: '',
          pwaAppId: '',
          commandLineArguments: '',
          workingDirectory: '',
          monitorIndex: 1,
          minimized: false,
          maximized: false,
          position: { left: 2000, top: 50, width: 600, height: 400 },
        },
      ],
      monitors: [
        { id: 'm0', instanceId: 'DISPLAY\\m0', number: 1, dpi: 96, rect: { left: 0, top: 0, width: 1920, height: 1080 } },
        { id: 'm1', instanceId: 'DISPLAY\\m1', number: 1, dpi: 96, rect: { left: 1920, top: 0, width: 1920, height: 1080 } },
      ],
    });
    expect(await definitions.loadAll()).toEqual([workspace]);
    expect((await buttons.loadButtons()).map((button) => [button.id, button.name])).toEqual([
      ['workspace::id-3', 'Writing'],
    ]);
    expect(registry.getBoundWindow('id-1')).toBe('h1');
    expect(registry.getBoundWindow('id-2')).toBe('h2');
    expect(registry.getWorkspaceIdForApp('id-1')).toBe('id-3');
  });

  it('reuses ids when re-capturing under an existing name', async () => {
    desktop.windows = [notesWindow, playerWindow];
    await snapshotter.snapshot('Writing');
    await definitions.updateLastLaunchedTime('id-3', 1_760_000_000);

    desktop.windows = [{ ...notesWindow, title: 'Other - Notes' }];
    const recaptured = await snapshotter.snapshot('writing');

    expect(recaptured?.id).toBe('id-3');
    expect(recaptured?.name).toBe('writing');
    expect(recaptured?.lastLaunchedTime).toBe(1_760_000_000);
    expect(recaptured?.applications.map((app) => [app.id, app.title])).toEqual([['id-1', 'Other - Notes']]);
    expect((await definitions.loadAll()).map((ws) => ws.id)).toEqual(['id-3']);
    expect(registry.getBoundWindow('id-1')).toBe('h1');
    expect(registry.getBoundWindow('id-2')).toBeNull();
  });

  it('returns null and saves nothing when no window qualifies', async () => {
    desktop.windows = [desktopWindow({ processId: 1, title: 'Toolbar', processPath: 'C:\\toolbar.exe' })];

    expect(await snapshotter.snapshot('Empty')).toBeNull();
    expect(await definitions.loadAll()).toEqual([]);
  });

  it('rejects an empty name', async () => {
    await expect(snapshotter.snapshot('   ')).rejects.toThrow('Workspace name cannot be empty.');
  });
});

describe('snapshot helpers', () => {
  it('borrows the real process path for frame-host windows', () => {
    const hosted = desktopWindow({ processId: 400, title: 'Calculator', processPath: FRAME_HOST });
    const real = desktopWindow({
      processId: 500,
      title: 'calculator',
      processPath: 'C:\\Program Files\\WindowsApps\\Calc\\Calculator.exe',
      isVisible: false,
    });
    const unrelated = desktopWindow({ processId: 600, title: 'Notes', processPath: 'C:\\Apps\\Notes.exe' });

    expect(resolveProcessPath(hosted, [hosted, unrelated, real])).toBe(
      'C:\\Program Files\\WindowsApps\\Calc\\Calculator.exe'
    );
    expect(resolveProcessPath(hosted, [hosted, unrelated])).toBe(FRAME_HOST);
    expect(resolveProcessPath(unrelated, [hosted, unrelated, real])).toBe('C:\\Apps\\Notes.exe');
  });

  it('skips empty-bounds windows', () => {
    const window = desktopWindow({ title: 'Zero', bounds: { left: 0, top: 0, width: 0, height: 300 } });
    expect(shouldCaptureWindow(window, 1)).toBe(false);
  });

  it('resolves monitors by centre, then by overlap', () => {
    const monitors = [
      monitor('m0', { left: 0, top: 0, width: 1000, height: 1000 }),
      monitor('m1', { left: 1000, top: 0, width: 1000, height: 1000 }),
    ];

    expect(resolveMonitorIndex({ left: 1200, top: 100, width: 200, height: 200 }, monitors)).toBe(1);
    expect(resolveMonitorIndex({ left: 900, top: -800, width: 400, height: 1000 }, monitors)).toBe(1);
    expect(resolveMonitorIndex({ left: 5000, top: 5000, width: 10, height: 10 }, monitors)).toBe(0);
    expect(resolveMonitorIndex({ left: 0, top: 0, width: 10, height: 10 }, [])).toBe(0);
  });
});
