/**
 * Workspace Provider
 *
 * What this file is:
 * - The action provider behind the "Workspaces" toolbar group.
 *
 * What it does:
 * - Keeps a versioned cache of saved workspaces (definitions joined with
 *   their button metadata) and reloads it when either file changes on disk,
 *   debounced so a burst of writes costs one reload.
 * - Emits `actions-updated` naming every enabled workspace button whenever a
 *   reload finds a real difference.
 * - Discovers one launch action per enabled workspace, projects the buttons
 *   into a group, and launches workspaces on invoke.
 * - Snapshots the desktop into a new workspace.
 */

import { ChangeChannel } from '../actions/change-channel';
import { isCancellation } from '../actions/cancellation';
import { actionsUpdated } from '../actions/provider-events';
import {
  fail,
  type ActionContext,
  type ActionDescriptor,
  type ActionIcon,
  type ActionResult,
  type ButtonGroup,
  type ChangeNotifyingProvider,
  type GroupProvider,
  type ProgressSink,
  type ProviderChangedEvent,
  type ProviderChangedListener,
  type ProviderInfo,
  type ToolbarButton,
  type Unsubscribe,
} from '../actions/types';
import { equalsIgnoreCase } from '../json-values';
import {
  DEFAULT_WORKSPACE_ICON_ID,
  workspaceButtonId,
  workspaceIdFromButtonId,
  type WorkspaceButtonStore,
} from '../workspaces/button-store';
import type { WorkspaceDefinitionStore } from '../workspaces/definition-store';
import { watchFiles } from '../workspaces/file-watcher';
import type { WorkspaceLauncher } from '../workspaces/launcher';
import { RecordCache, type CachedRecord } from '../workspaces/record-cache';
import type { WorkspaceSnapshotter } from '../workspaces/snapshotter';
import { WORKSPACE_PROVIDER_ID } from '../workspaces/storage-paths';
import type {
  ProviderIcon,
  WorkspaceButtonConfig,
  WorkspaceDefinition,
} from '../workspaces/types';
import { RestartTimer } from './restart-timer';

export const WORKSPACE_ACTION_PREFIX = 'workspace.launch:';
export const WORKSPACE_GROUP_ID = 'workspaces';

const DEFAULT_RELOAD_DEBOUNCE_MS = 250;
const MAX_INLINE_BUTTONS = 8;

export interface WorkspaceProviderOptions {
  definitions: WorkspaceDefinitionStore;
  buttons: WorkspaceButtonStore;
  snapshotter: WorkspaceSnapshotter;
  launcher: WorkspaceLauncher;
  reloadDebounceMs?: number;
  /** Watch both backing files for external edits. */
  watch?: boolean;
}

// ─── Icons ──────────────────────────────────────────────────────────

export function iconSignature(icon: ProviderIcon | null): string {
  if (!icon) return 'none';
  return `${icon.type}|${icon.path}|${icon.glyph}|${icon.catalogId}`;
}

function defaultActionIcon(): ActionIcon {
  return { type: 'catalog', value: DEFAULT_WORKSPACE_ICON_ID };
}

/** Maps a persisted icon onto the button; unusable icons keep the default. */
export function toActionIcon(icon: ProviderIcon | null): ActionIcon {
  if (!icon) return defaultActionIcon();
  switch (icon.type) {
    case 'image':
      return icon.path.trim() ? { type: 'image', value: icon.path.trim() } : defaultActionIcon();
    case 'glyph':
      return icon.glyph.trim() ? { type: 'glyph', value: icon.glyph.trim() } : defaultActionIcon();
    case 'catalog':
      return icon.catalogId.trim()
        ? { type: 'catalog', value: icon.catalogId.trim() }
        : defaultActionIcon();
  }
}

// ─── Records ────────────────────────────────────────────────────────

function findButton(
  buttons: WorkspaceButtonConfig[],
  workspaceId: string
): WorkspaceButtonConfig | undefined {
  return buttons.find(
    (button) =>
      equalsIgnoreCase(button.workspaceId, workspaceId) ||
      equalsIgnoreCase(button.id, workspaceButtonId(workspaceId))
  );
}

export function buildWorkspaceRecords(
  workspaces: WorkspaceDefinition[],
  buttons: WorkspaceButtonConfig[]
): CachedRecord[] {
  const records: CachedRecord[] = [];
  for (const workspace of workspaces) {
    const id = workspace.id.trim();
    if (!id) continue;
    const button = findButton(buttons, id);
    records.push({
      id,
      name: workspace.name.trim(),
      iconSignature: iconSignature(button?.icon ?? null),
      enabled: button?.enabled ?? true,
      sortOrder: button?.sortOrder ?? null,
    });
  }
  return records;
}

function compareButtons(a: WorkspaceButtonConfig, b: WorkspaceButtonConfig): number {
  const orderA = a.sortOrder ?? Number.MAX_VALUE;
  const orderB = b.sortOrder ?? Number.MAX_VALUE;
  if (orderA !== orderB) return orderA - orderB;
  return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
}

// ─── Provider ───────────────────────────────────────────────────────

export class WorkspaceProvider implements GroupProvider, ChangeNotifyingProvider {
  readonly id = WORKSPACE_PROVIDER_ID;

  private readonly changes = new ChangeChannel<ProviderChangedEvent>();
  private readonly cache: RecordCache<CachedRecord>;
  private readonly reloadTimer: RestartTimer;
  private stopWatching: (() => void) | null = null;
  private disposed = false;

  constructor(private readonly options: WorkspaceProviderOptions) {
    this.cache = new RecordCache(
      () => this.readRecords(),
      (records) => this.handleRecordsChanged(records)
    );
    this.reloadTimer = new RestartTimer(
      options.reloadDebounceMs ?? DEFAULT_RELOAD_DEBOUNCE_MS,
      () => this.reloadIfChanged(),
      'workspace reload'
    );
    if (options.watch) {
      this.stopWatching = watchFiles(
        [options.definitions.filePath, options.buttons.filePath],
        () => this.notifyExternalChange()
      );
    }
  }

  /** Current cache version; 0 until the first read. */
  get version(): number {
    return this.cache.version;
  }

  async getInfo(): Promise<ProviderInfo> {
    return { name: 'Workspaces', version: '1.0' };
  }

  onProviderChanged(listener: ProviderChangedListener): Unsubscribe {
    return this.changes.subscribe(listener);
  }

  // ─── Cache ────────────────────────────────────────────────────────

  private async readRecords(): Promise<CachedRecord[]> {
    const [workspaces, buttons] = await Promise.all([
      this.options.definitions.loadAll(),
      this.options.buttons.loadButtons(),
    ]);
    return buildWorkspaceRecords(workspaces, buttons);
  }

  private handleRecordsChanged(records: CachedRecord[]): void {
    const affected = records
      .filter((record) => record.enabled)
      .map((record) => workspaceButtonId(record.id));
    this.changes.emit(actionsUpdated(this.id, affected));
  }

  /** Cached workspace records, loading them on first use. */
  getWorkspaces(): Promise<CachedRecord[]> {
    return this.cache.getRecords();
  }

  /** Re-reads both stores. Returns true when the cache moved to a new version. */
  async reloadIfChanged(): Promise<boolean> {
    if (this.disposed) return false;
    try {
      return await this.cache.reloadIfChanged();
    } catch (e) {
      console.error('Failed to reload workspace cache:', e);
      return false;
    }
  }

  /** Schedules a debounced reload; each call pushes the reload back. */
  notifyExternalChange(): void {
    if (this.disposed) return;
    this.reloadTimer.restart();
  }

  // ─── Discovery & groups ───────────────────────────────────────────

  async *discover(_context: ActionContext, signal?: AbortSignal): AsyncIterable<ActionDescriptor> {
    if (signal?.aborted) return;
    const workspaces = await this.getWorkspaces();
    let order = 0;
    for (const workspace of workspaces) {
      if (signal?.aborted) return;
      if (!workspace.enabled) continue;

      yield {
        id: `${WORKSPACE_ACTION_PREFIX}${workspace.id}`,
        providerId: this.id,
        title: workspace.name || workspace.id,
        subtitle: workspace.id,
        kind: 'launch',
        groupHint: WORKSPACE_GROUP_ID,
        order: order++,
        icon: defaultActionIcon(),
        canExecute: true,
        keywords: workspace.name ? [workspace.name, workspace.id] : [workspace.id],
      };
    }
  }

  async createGroup(_context: ActionContext, signal?: AbortSignal): Promise<ButtonGroup> {
    const [workspaces, config] = await Promise.all([
      this.options.definitions.loadAll(),
      this.options.buttons.loadConfig(),
    ]);
    signal?.throwIfAborted();

    const ordered =
      config.buttons.length > 0
        ? config.buttons.filter((button) => button.enabled).sort(compareButtons)
        : workspaces.map((workspace) => ({
            id: workspaceButtonId(workspace.id),
            workspaceId: workspace.id,
            name: workspace.name.trim() || workspace.id,
            description: workspace.id,
            enabled: true,
            sortOrder: null,
            icon: null,
          }));

    const buttons: ToolbarButton[] = [];
    for (const entry of ordered) {
      const workspaceId = entry.workspaceId || workspaceIdFromButtonId(entry.id);
      if (!workspaceId) continue;
      const definition = workspaces.find((workspace) => equalsIgnoreCase(workspace.id, workspaceId));

      buttons.push({
        id: workspaceButtonId(workspaceId),
        name: entry.name.trim() || definition?.name.trim() || workspaceId,
        description: entry.description.trim() || workspaceId,
        icon: toActionIcon(entry.icon),
        isEnabled: true,
        isDimmed: false,
        action: {
          type: 'provider',
          providerId: this.id,
          providerActionId: `${WORKSPACE_ACTION_PREFIX}${workspaceId}`,
        },
      });
    }

    return {
      id: WORKSPACE_GROUP_ID,
      name: 'Workspaces',
      description: 'Saved workspace layouts',
      isEnabled: true,
      layout: { style: 'capsule', overflow: 'menu', maxInline: MAX_INLINE_BUTTONS },
      buttons,
      providerId: this.id,
    };
  }

  // ─── Actions ──────────────────────────────────────────────────────

  async invoke(
    actionId: string,
    _args: unknown,
    _context: ActionContext,
    progress?: ProgressSink,
    signal?: AbortSignal
  ): Promise<ActionResult> {
    const value = String(actionId || '');
    if (!value.toLowerCase().startsWith(WORKSPACE_ACTION_PREFIX)) {
      return fail('Invalid workspace action id.');
    }
    const workspaceId = value.slice(WORKSPACE_ACTION_PREFIX.length).trim();
    if (!workspaceId) return fail('Workspace identifier is empty.');

    try {
      progress?.({ note: 'Launching workspace…' });
      const report = await this.options.launcher.launch(workspaceId, signal);
      progress?.({ percent: 100 });
      return { ok: report.ok, message: report.message };
    } catch (e) {
      if (isCancellation(e, signal)) throw e;
      console.error(`[Workspaces] Launch of "${workspaceId}" failed:`, e);
      return fail(e instanceof Error ? e.message : String(e));
    }
  }

  /**
   * Captures the desktop into a workspace named `name`. Null when no window
   * qualified.
   */
  async snapshot(name: string, signal?: AbortSignal): Promise<WorkspaceDefinition | null> {
    const workspace = await this.options.snapshotter.snapshot(name, signal);
    await this.reloadIfChanged();
    return workspace;
  }

  /** Removes the workspace and its button. Returns false when it did not exist. */
  async deleteWorkspace(workspaceId: string): Promise<boolean> {
    const removed = await this.options.definitions.deleteWorkspace(workspaceId);
    await this.options.buttons.removeWorkspaceButton(workspaceId);
    await this.reloadIfChanged();
    return removed;
  }

  dispose(): void {
    this.disposed = true;
    this.stopWatching?.();
    this.stopWatching = null;
    this.reloadTimer.cancel();
    this.changes.clear();
  }
}
