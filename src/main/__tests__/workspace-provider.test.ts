import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ActionDescriptor, ActionProgress, ProviderChangedEvent } from '../actions/types';
import {
  WorkspaceProvider,
  buildWorkspaceRecords,
  iconSignature,
  toActionIcon,
} from '../providers/workspace-provider';
import { WorkspaceButtonStore } from '../workspaces/button-store';
import { WorkspaceDefinitionStore } from '../workspaces/definition-store';
import { WorkspaceLauncher } from '../workspaces/launcher';
import { ManagedWindowRegistry } from '../workspaces/managed-window-registry';
import { WorkspaceSnapshotter } from '../workspaces/snapshotter';
import type { WorkspaceButtonConfig, WorkspaceDefinition } from '../workspaces/types';
import { createWindowMatcher } from '../workspaces/window-matcher';
import { FakeDesktop, desktopWindow } from './desktop-fakes';

function workspace(id: string, name: string): WorkspaceDefinition {
  return {
    id,
    name,
    creationTime: 1,
    lastLaunchedTime: 0,
    moveExistingWindows: true,
    applications: [],
    monitors: [],
  };
}

function button(workspaceId: string, fields: Partial<WorkspaceButtonConfig> = {}): WorkspaceButtonConfig {
  return {
    id: `workspace::${workspaceId}`,
    workspaceId,
    name: '',
    description: '',
    enabled: true,
    sortOrder: null,
    icon: null,
    ...fields,
  };
}

let tempDir = '';
let desktop: FakeDesktop;
let definitions: WorkspaceDefinitionStore;
let buttons: WorkspaceButtonStore;
let provider: WorkspaceProvider;
let events: ProviderChangedEvent[];

async function collect(iterable: AsyncIterable<ActionDescriptor>): Promise<ActionDescriptor[]> {
  const results: ActionDescriptor[] = [];
  for await (const item of iterable) results.push(item);
  return results;
}

function createProvider(options: { watch?: boolean; reloadDebounceMs?: number } = {}): WorkspaceProvider {
  const registry = new ManagedWindowRegistry();
  const matcher = createWindowMatcher();
  let counter = 0;
  return new WorkspaceProvider({
    definitions,
    buttons,
    snapshotter: new WorkspaceSnapshotter({
      windows: desktop,
      displays: desktop,
      definitions,
      buttons,
      registry,
      matcher,
      createId: () => `id-${++counter}`,
    }),
    launcher: new WorkspaceLauncher({
      windows: desktop,
      launcher: desktop,
      definitions,
      registry,
      matcher,
      windowTimeoutMs: 0,
    }),
    reloadDebounceMs: options.reloadDebounceMs ?? 250,
    watch: options.watch ?? false,
  });
}

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'workspace-provider-test-'));
  desktop = new FakeDesktop(1);
  definitions = new WorkspaceDefinitionStore(path.join(tempDir, 'workspaces', 'workspaces.json'));
  buttons = new WorkspaceButtonStore(path.join(tempDir, 'providers', 'WorkspaceProvider.json'));
  provider = createProvider();
  events = [];
  provider.onProviderChanged((event) => events.push(event));
});

afterEach(() => {
  provider.dispose();
  vi.useRealTimers();
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('WorkspaceProvider discovery', () => {
  it('yields one launch action per enabled workspace', async () => {
    await definitions.saveAll([workspace('a', 'Alpha'), workspace('b', 'Beta'), workspace('c', '')]);
    await buttons.saveButtons([button('b', { enabled: false })]);

    const actions = await collect(provider.discover({}));

    expect(actions).toEqual([
      {
        id: 'workspace.launch:a',
        providerId: 'WorkspaceProvider',
        title: 'Alpha',
        subtitle: 'a',
        kind: 'launch',
        groupHint: 'workspaces',
        order: 0,
        icon: { type: 'catalog', value: 'layout-grid' },
        canExecute: true,
        keywords: ['Alpha', 'a'],
      },
      {
        id: 'workspace.launch:c',
        providerId: 'WorkspaceProvider',
        title: 'c',
        subtitle: 'c',
        kind: 'launch',
        groupHint: 'workspaces',
        order: 1,
        icon: { type: 'catalog', value: 'layout-grid' },
        canExecute: true,
        keywords: ['c'],
      },
    ]);
    expect(provider.version).toBe(1);
  });

  it('yields nothing once aborted', async () => {
    await definitions.saveAll([workspace('a', 'Alpha')]);
    const controller = new AbortController();
    controller.abort();

    expect(await collect(provider.discover({}, controller.signal))).toEqual([]);
  });
});

describe('WorkspaceProvider groups', () => {
  it('orders enabled buttons by sort order, then name', async () => {
    await definitions.saveAll([
      workspace('a', 'Alpha'),
      workspace('b', 'Beta'),
      workspace('c', 'Gamma'),
      workspace('d', 'Delta'),
    ]);
    await buttons.saveButtons([
      button('b', { name: 'Beta', sortOrder: 2, icon: { type: 'glyph', path: '', glyph: '★', catalogId: '' } }),
      button('a', { name: 'alpha' }),
      button('c', { sortOrder: 1 }),
      button('d', { name: 'Delta', enabled: false, sortOrder: 0 }),
    ]);

    const group = await provider.createGroup({});

    expect(group.id).toBe('workspaces');
    expect(group.layout).toEqual({ style: 'capsule', overflow: 'menu', maxInline: 8 });
    expect(group.buttons.map((b) => [b.id, b.name, b.description])).toEqual([
      ['workspace::c', 'Gamma', 'c'],
      ['workspace::b', 'Beta', 'b'],
      ['workspace::a', 'alpha', 'a'],
    ]);
    expect(group.buttons[1].icon).toEqual({ type: 'glyph', value: '★' });
    expect(group.buttons[0].icon).toEqual({ type: 'catalog', value: 'layout-grid' });
    expect(group.buttons[0].action).toEqual({
      type: 'provider',
      providerId: 'WorkspaceProvider',
      providerActionId: 'workspace.launch:c',
    });
  });

  it('builds buttons straight from definitions when no button metadata exists', async () => {
    await definitions.saveAll([workspace('z', 'Zulu'), workspace('y', '')]);

    const group = await provider.createGroup({});

    expect(group.buttons.map((b) => [b.id, b.name])).toEqual([
      ['workspace::z', 'Zulu'],
      ['workspace::y', 'y'],
    ]);
  });
});

describe('WorkspaceProvider invoke', () => {
  it('validates the action id', async () => {
    expect(await provider.invoke('launch:a', undefined, {})).toEqual({
      ok: false,
      message: 'Invalid workspace action id.',
    });
    expect(await provider.invoke('workspace.launch:   ', undefined, {})).toEqual({
      ok: false,
      message: 'Workspace identifier is empty.',
    });
  });

  it('reports progress and the launch outcome', async () => {
    await definitions.saveAll([workspace('a', 'Alpha')]);
    const progress: ActionProgress[] = [];

    const result = await provider.invoke('workspace.launch:a', undefined, {}, (p) => progress.push(p));

    expect(result).toEqual({ ok: false, message: 'Workspace has no applications to launch.' });
    expect(progress).toEqual([{ note: 'Launching workspace…' }, { percent: 100 }]);
  });

  it('passes through an unknown workspace as a failure', async () => {
    expect(await provider.invoke('workspace.launch:missing', undefined, {})).toEqual({
      ok: false,
      message: 'Workspace "missing" was not found.',
    });
  });
});

describe('WorkspaceProvider cache', () => {
  it('announces enabled buttons when the backing files change', async () => {
    await definitions.saveAll([workspace('a', 'Alpha')]);
    await provider.getWorkspaces();

    await definitions.saveWorkspace(workspace('b', 'Beta'));
    await buttons.saveButtons([button('a', { enabled: false })]);

    expect(await provider.reloadIfChanged()).toBe(true);
    expect(provider.version).toBe(2);
    expect(events).toEqual([
      { providerId: 'WorkspaceProvider', kind: 'actions-updated', affectedIds: ['workspace::b'] },
    ]);
  });

  it('stays quiet when nothing the toolbar shows has changed', async () => {
    await definitions.saveAll([workspace('a', 'Alpha')]);
    await provider.getWorkspaces();

    await definitions.updateLastLaunchedTime('a', 1_800_000_000);

    expect(await provider.reloadIfChanged()).toBe(false);
    expect(provider.version).toBe(1);
    expect(events).toEqual([]);
  });

  it('debounces external change notifications', () => {
    vi.useFakeTimers();
    const reload = vi.spyOn(provider, 'reloadIfChanged').mockResolvedValue(false);

    provider.notifyExternalChange();
    vi.advanceTimersByTime(100);
    provider.notifyExternalChange();
    provider.notifyExternalChange();
    vi.advanceTimersByTime(249);
    expect(reload).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(reload).toHaveBeenCalledTimes(1);
  });

  it('turns a burst of external writes into one reload', async () => {
    await definitions.saveAll([workspace('a', 'Alpha')]);
    provider.dispose();
    provider = createProvider({ watch: true, reloadDebounceMs: 50 });
    provider.onProviderChanged((event) => events.push(event));
    await provider.getWorkspaces();
    expect(provider.version).toBe(1);

    const write = (list: WorkspaceDefinition[]) =>
      fs.writeFileSync(definitions.filePath, JSON.stringify({ workspaces: list }), 'utf-8');
    write([workspace('a', 'Alpha'), workspace('b', 'Beta')]);
    write([workspace('a', 'Alpha'), workspace('b', 'Beta'), workspace('c', 'Gamma')]);
    write([workspace('b', 'Beta')]);

    await vi.waitFor(() => expect(events).toHaveLength(1), { timeout: 2_000, interval: 20 });
    await new Promise((resolve) => setTimeout(resolve, 200));

    expect(events).toEqual([
      { providerId: 'WorkspaceProvider', kind: 'actions-updated', affectedIds: ['workspace::b'] },
    ]);
    expect(provider.version).toBe(2);
  });

  it('ignores notifications after dispose', async () => {
    vi.useFakeTimers();
    const reload = vi.spyOn(provider, 'reloadIfChanged');

    provider.dispose();
    provider.notifyExternalChange();
    vi.advanceTimersByTime(1_000);

    expect(reload).not.toHaveBeenCalled();
  });
});

describe('WorkspaceProvider snapshot and delete', () => {
  it('captures a workspace and refreshes the cache', async () => {
    await provider.getWorkspaces();
    desktop.windows = [
      desktopWindow({ handle: 'h1', processId: 200, title: 'Draft', processPath: 'C:\\Apps\\Notes.exe' }),
    ];

    const captured = await provider.snapshot('Focus');

    expect(captured?.id).toBe('id-2');
    expect(captured?.applications.map((app) => app.id)).toEqual(['id-1']);
    expect(events).toEqual([
      { providerId: 'WorkspaceProvider', kind: 'actions-updated', affectedIds: ['workspace::id-2'] },
    ]);
    expect((await provider.getWorkspaces()).map((record) => record.name)).toEqual(['Focus']);
  });

  it('deletes the definition and its button', async () => {
    await definitions.saveAll([workspace('a', 'Alpha'), workspace('b', 'Beta')]);
    await buttons.ensureButton(workspace('a', 'Alpha'));
    await provider.getWorkspaces();

    expect(await provider.deleteWorkspace('a')).toBe(true);
    expect(await provider.deleteWorkspace('a')).toBe(false);

    expect(await buttons.loadButtons()).toEqual([]);
    expect((await provider.getWorkspaces()).map((record) => record.id)).toEqual(['b']);
    expect(events).toHaveLength(1);
  });
});

describe('record helpers', () => {
  it('joins definitions with their buttons', () => {
    const records = buildWorkspaceRecords(
      [workspace('a', ' Alpha '), workspace(' ', 'Blank'), workspace('b', 'Beta')],
      [button('b', { enabled: false, sortOrder: 4, icon: { type: 'catalog', path: '', glyph: '', catalogId: 'star' } })]
    );

    expect(records).toEqual([
      { id: 'a', name: 'Alpha', iconSignature: 'none', enabled: true, sortOrder: null },
      { id: 'b', name: 'Beta', iconSignature: 'catalog|||star', enabled: false, sortOrder: 4 },
    ]);
  });

  it('falls back to the default icon for unusable icons', () => {
    expect(toActionIcon(null)).toEqual({ type: 'catalog', value: 'layout-grid' });
    expect(toActionIcon({ type: 'image', path: '  ', glyph: '', catalogId: '' })).toEqual({
      type: 'catalog',
      value: 'layout-grid',
    });
    expect(toActionIcon({ type: 'image', path: '/icons/a.png', glyph: '', catalogId: '' })).toEqual({
      type: 'image',
      value: '/icons/a.png',
    });
    expect(iconSignature({ type: 'glyph', path: '', glyph: '★', catalogId: '' })).toBe('glyph||★|');
  });
});
