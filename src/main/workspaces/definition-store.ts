/**
 * Workspace Definition Store
 *
 * What this file is:
 * - Persistence for saved workspaces (`{ workspaces: WorkspaceDefinition[] }`).
 *
 * What it does:
 * - Reads leniently: a missing file is an empty list, a malformed file is
 *   logged and treated as empty, malformed entries are dropped.
 * - Writes optimistically: read, modify, then re-check the file version under
 *   the write lock before replacing the file. A concurrent change restarts
 *   the cycle, up to SAVE_MAX_ATTEMPTS times.
 * - Hands out clones so callers cannot mutate cached state.
 */

import { delay } from '../actions/cancellation';
import {
  asArray,
  asBoolean,
  asFiniteNumber,
  asString,
  asTrimmedString,
  equalsIgnoreCase,
  isRecord,
} from '../json-values';
import { readFileVersion, readTextIfExists, withWriteLock, writeFileAtomic } from './file-guard';
import type {
  ApplicationDefinition,
  MonitorDefinition,
  Rect,
  WorkspaceDefinition,
} from './types';

const SAVE_MAX_ATTEMPTS = 6;
const SAVE_RETRY_DELAY_MS = 60;

// ─── Normalization ──────────────────────────────────────────────────

function normalizeRect(value: unknown): Rect {
  const raw = isRecord(value) ? value : {};
  return {
    left: asFiniteNumber(raw.left, 0),
    top: asFiniteNumber(raw.top, 0),
    width: asFiniteNumber(raw.width, 0),
    height: asFiniteNumber(raw.height, 0),
  };
}

function normalizeApplication(value: unknown): ApplicationDefinition | null {
  if (!isRecord(value)) return null;
  return {
    id: asTrimmedString(value.id),
    name: asString(value.name),
    path: asString(value.path),
    title: asString(value.title),
    appUserModelId: asString(value.appUserModelId),
    packageFullName: asString(value.packageFullName),
    pwaAppId: asString(value.pwaAppId),
    commandLineArguments: asString(value.commandLineArguments),
    workingDirectory: asString(value.workingDirectory),
    monitorIndex: asFiniteNumber(value.monitorIndex, 0),
    minimized: asBoolean(value.minimized, false),
    maximized: asBoolean(value.maximized, false),
    position: normalizeRect(value.position),
  };
}

function normalizeMonitor(value: unknown): MonitorDefinition | null {
  if (!isRecord(value)) return null;
  return {
    id: asString(value.id),
    instanceId: asString(value.instanceId),
    number: asFiniteNumber(value.number, 0),
    dpi: asFiniteNumber(value.dpi, 96),
    rect: normalizeRect(value.rect),
  };
}

function isPresent<T>(value: T | null): value is T {
  return value !== null;
}

export function normalizeWorkspace(value: unknown): WorkspaceDefinition | null {
  if (!isRecord(value)) return null;
  const id = asTrimmedString(value.id);
  if (!id) return null;
  return {
    id,
    name: asString(value.name),
    creationTime: asFiniteNumber(value.creationTime, 0),
    lastLaunchedTime: asFiniteNumber(value.lastLaunchedTime, 0),
    moveExistingWindows: asBoolean(value.moveExistingWindows, false),
    applications: asArray(value.applications).map(normalizeApplication).filter(isPresent),
    monitors: asArray(value.monitors).map(normalizeMonitor).filter(isPresent),
  };
}

export function parseWorkspaceDocument(raw: string): WorkspaceDefinition[] {
  const parsed: unknown = JSON.parse(raw);
  const list = isRecord(parsed) ? parsed.workspaces : parsed;
  return asArray(list).map(normalizeWorkspace).filter(isPresent);
}

export function cloneWorkspace(workspace: WorkspaceDefinition): WorkspaceDefinition {
  return {
    ...workspace,
    applications: workspace.applications.map((app) => ({ ...app, position: { ...app.position } })),
    monitors: workspace.monitors.map((monitor) => ({ ...monitor, rect: { ...monitor.rect } })),
  };
}

// ─── Store ──────────────────────────────────────────────────────────

interface Snapshot {
  version: string;
  workspaces: WorkspaceDefinition[];
}

export class WorkspaceDefinitionStore {
  constructor(readonly filePath: string) {}

  private async readSnapshot(): Promise<Snapshot> {
    const version = await readFileVersion(this.filePath);
    const raw = await readTextIfExists(this.filePath);
    if (raw === null || !raw.trim()) return { version, workspaces: [] };
    try {
      return { version, workspaces: parseWorkspaceDocument(raw) };
    } catch (e) {
      console.error('Failed to load workspace definitions:', this.filePath, e);
      return { version, workspaces: [] };
    }
  }

  async loadAll(): Promise<WorkspaceDefinition[]> {
    const snapshot = await this.readSnapshot();
    return snapshot.workspaces.map(cloneWorkspace);
  }

  async loadById(workspaceId: string): Promise<WorkspaceDefinition | null> {
    const id = String(workspaceId || '').trim();
    if (!id) return null;
    const all = await this.loadAll();
    return all.find((workspace) => equalsIgnoreCase(workspace.id, id)) ?? null;
  }

  /**
   * Replaces any workspace with the same id or the same name (case-insensitive)
   * and puts the saved one first.
   */
  async saveWorkspace(workspace: WorkspaceDefinition): Promise<void> {
    if (!workspace || !String(workspace.id || '').trim()) {
      throw new Error('Workspace id is required.');
    }
    const saved = cloneWorkspace(workspace);
    await this.mutate((list) => {
      const rest = list.filter(
        (existing) =>
          !equalsIgnoreCase(existing.id, saved.id) &&
          !(saved.name.trim() && equalsIgnoreCase(existing.name.trim(), saved.name.trim()))
      );
      return [saved, ...rest];
    });
  }

  /** Returns false when no workspace had that id. */
  async deleteWorkspace(workspaceId: string): Promise<boolean> {
    const id = String(workspaceId || '').trim();
    if (!id) return false;
    let removed = false;
    await this.mutate((list) => {
      const rest = list.filter((workspace) => !equalsIgnoreCase(workspace.id, id));
      removed = rest.length !== list.length;
      return removed ? rest : null;
    });
    return removed;
  }

  async saveAll(workspaces: WorkspaceDefinition[]): Promise<void> {
    const copies = workspaces.map(cloneWorkspace);
    await this.mutate(() => copies);
  }

  /** Stamps `lastLaunchedTime` (unix seconds). Returns false when the id is unknown. */
  async updateLastLaunchedTime(
    workspaceId: string,
    unixSeconds = Math.floor(Date.now() / 1000)
  ): Promise<boolean> {
    let found = false;
    await this.mutate((list) => {
      const target = list.find((workspace) => equalsIgnoreCase(workspace.id, workspaceId));
      if (!target) return null;
      found = true;
      target.lastLaunchedTime = unixSeconds;
      return list;
    });
    return found;
  }

  /**
   * Optimistic read-modify-write. `update` returns the new list, or null to
   * leave the file untouched.
   */
  private async mutate(
    update: (list: WorkspaceDefinition[]) => WorkspaceDefinition[] | null
  ): Promise<void> {
    for (let attempt = 1; attempt <= SAVE_MAX_ATTEMPTS; attempt++) {
      const snapshot = await this.readSnapshot();
      const next = update(snapshot.workspaces.map(cloneWorkspace));
      if (next === null) return;

      const written = await withWriteLock(this.filePath, async () => {
        const current = await readFileVersion(this.filePath);
        if (current !== snapshot.version) return false;
        await writeFileAtomic(this.filePath, JSON.stringify({ workspaces: next }, null, 2));
        return true;
      });
      if (written) return;

      console.warn(`[Workspaces] Definitions changed during save (attempt ${attempt}); retrying.`);
      await delay(SAVE_RETRY_DELAY_MS);
    }
    throw new Error(`Failed to save workspace definitions after ${SAVE_MAX_ATTEMPTS} attempts.`);
  }
}
