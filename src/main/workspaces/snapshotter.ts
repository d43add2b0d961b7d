/**
 * Workspace Snapshotter
 *
 * Captures the running desktop into a WorkspaceDefinition:
 * - every visible, titled top-level window that is not shell chrome, a tool
 *   window or the toolbar itself becomes one ApplicationDefinition;
 * - UWP frame-host windows borrow the real process path from a same-titled
 *   window owned by another process when one exists;
 * - the monitor topology is stored alongside so a later launch can reason
 *   about where windows used to be.
 *
 * Re-capturing under an existing name keeps that workspace's id and reuses
 * application ids for windows the matcher ties to the old definitions.
 */

import { throwIfAborted } from '../actions/cancellation';
import { equalsIgnoreCase, hasText } from '../json-values';
import type { DisplaySource, WindowSource } from '../platform/interface';
import type { WorkspaceButtonStore } from './button-store';
import type { WorkspaceDefinitionStore } from './definition-store';
import type { ManagedWindowRegistry } from './managed-window-registry';
import { isFrameHostPath, normalizeFileName, type WindowMatcher } from './window-matcher';
import { findBestDefinition } from './window-resolver';
import {
  createRecordId,
  type ApplicationDefinition,
  type DesktopMonitor,
  type DesktopWindow,
  type MonitorDefinition,
  type Rect,
  type WorkspaceDefinition,
} from './types';

const EXCLUDED_WINDOW_CLASSES = new Set(
  [
    'Shell_TrayWnd',
    'Shell_SecondaryTrayWnd',
    'TaskListThumbnailWnd',
    'Progman',
    'WorkerW',
    'NotifyIconOverflowWindow',
    'SysShadow',
    'SearchPane',
    'SearchHost',
    'Windows.UI.Core.CoreWindow',
    'NativeHWNDHost',
    'ApplicationManager_DesktopShellWindow',
    'LauncherTipWndClass',
  ].map((name) => name.toLowerCase())
);

const EXCLUDED_WINDOW_TITLES = new Set(['program manager']);

export interface SnapshotterDeps {
  windows: WindowSource;
  displays: DisplaySource;
  definitions: WorkspaceDefinitionStore;
  buttons: WorkspaceButtonStore;
  registry: ManagedWindowRegistry;
  matcher: WindowMatcher;
  /** Unix seconds. */
  now?: () => number;
  createId?: () => string;
}

// ─── Geometry ───────────────────────────────────────────────────────

function isEmptyRect(rect: Rect): boolean {
  return rect.width <= 0 || rect.height <= 0;
}

function containsPoint(rect: Rect, x: number, y: number): boolean {
  return x >= rect.left && x < rect.left + rect.width && y >= rect.top && y < rect.top + rect.height;
}

function intersectionArea(a: Rect, b: Rect): number {
  const width = Math.min(a.left + a.width, b.left + b.width) - Math.max(a.left, b.left);
  const height = Math.min(a.top + a.height, b.top + b.height) - Math.max(a.top, b.top);
  return width > 0 && height > 0 ? width * height : 0;
}

/**
 * Monitor holding the window's centre, else the one it overlaps most, else 0.
 */
export function resolveMonitorIndex(bounds: Rect, monitors: DesktopMonitor[]): number {
  const cx = bounds.left + bounds.width / 2;
  const cy = bounds.top + bounds.height / 2;
  const containing = monitors.findIndex((monitor) => containsPoint(monitor.bounds, cx, cy));
  if (containing >= 0) return containing;

  let bestIndex = 0;
  let bestArea = 0;
  monitors.forEach((monitor, index) => {
    const area = intersectionArea(bounds, monitor.bounds);
    if (area > bestArea) {
      bestArea = area;
      bestIndex = index;
    }
  });
  return bestIndex;
}

// ─── Window filtering ───────────────────────────────────────────────

export function isExcludedWindow(window: DesktopWindow): boolean {
  if (window.isToolWindow) return true;
  if (EXCLUDED_WINDOW_CLASSES.has(window.className.toLowerCase())) return true;
  return EXCLUDED_WINDOW_TITLES.has(window.title.trim().toLowerCase());
}

function isFrameHostWindow(window: DesktopWindow): boolean {
  return isFrameHostPath(window.processPath) || isFrameHostPath(window.processFileName);
}

/**
 * The process path to store for `window`. A frame-host window borrows the
 * path of a same-titled window owned by a different process.
 */
export function resolveProcessPath(window: DesktopWindow, all: DesktopWindow[]): string {
  if (!isFrameHostWindow(window)) return window.processPath.trim();

  const sibling = all.find(
    (candidate) =>
      candidate.processId !== window.processId &&
      hasText(candidate.processPath) &&
      !isFrameHostWindow(candidate) &&
      equalsIgnoreCase(candidate.title.trim(), window.title.trim())
  );
  return sibling ? sibling.processPath.trim() : window.processPath.trim();
}

export function shouldCaptureWindow(window: DesktopWindow, ownProcessId: number): boolean {
  if (!window.isVisible || window.processId === ownProcessId) return false;
  if (isEmptyRect(window.bounds)) return false;
  if (!hasText(window.title)) return false;
  return !isExcludedWindow(window);
}

function toMonitorDefinition(monitor: DesktopMonitor): MonitorDefinition {
  return {
    id: monitor.id,
    instanceId: monitor.instanceId,
    number: monitor.number,
    dpi: monitor.dpi,
    rect: { ...monitor.bounds },
  };
}

// ─── Snapshotter ────────────────────────────────────────────────────

export class WorkspaceSnapshotter {
  private readonly now: () => number;
  private readonly createId: () => string;

  constructor(private readonly deps: SnapshotterDeps) {
    this.now = deps.now ?? (() => Math.floor(Date.now() / 1000));
    this.createId = deps.createId ?? createRecordId;
  }

  /**
   * Captures and persists a workspace named `name`, creates its toolbar
   * button and binds the captured windows. Null when no window qualified.
   */
  async snapshot(name: string, signal?: AbortSignal): Promise<WorkspaceDefinition | null> {
    const trimmedName = String(name || '').trim();
    if (!trimmedName) throw new Error('Workspace name cannot be empty.');

    const existing = (await this.deps.definitions.loadAll()).find((workspace) =>
      equalsIgnoreCase(workspace.name.trim(), trimmedName)
    );
    const captured = await this.capture(trimmedName, existing ?? null, signal);
    if (!captured) return null;

    throwIfAborted(signal);
    await this.deps.definitions.saveWorkspace(captured.workspace);
    await this.deps.buttons.ensureButton(captured.workspace);

    this.deps.registry.unbindWorkspace(captured.workspace.id);
    for (const [appId, handle] of captured.handles) {
      this.deps.registry.tryBind(captured.workspace.id, appId, handle);
    }
    return captured.workspace;
  }

  /** Builds the definition without saving it. */
  async capture(
    name: string,
    previous: WorkspaceDefinition | null,
    signal?: AbortSignal
  ): Promise<{ workspace: WorkspaceDefinition; handles: Map<string, string> } | null> {
    const monitors = await this.deps.displays.listMonitors();
    const windows = await this.deps.windows.listWindows();
    const previousApps = previous?.applications ?? [];
    const claimed = new Set<string>();
    const handles = new Map<string, string>();
    const applications: ApplicationDefinition[] = [];

    for (const window of windows) {
      throwIfAborted(signal);
      if (!shouldCaptureWindow(window, this.deps.windows.currentProcessId)) continue;

      const processPath = resolveProcessPath(window, windows);
      if (!processPath) continue;

      const reused = findBestDefinition(window, previousApps, this.deps.matcher, claimed);
      const id = reused?.item.id || this.createId();
      claimed.add(id);

      applications.push({
        id,
        name: normalizeFileName(processPath),
        path: processPath,
        title: window.title,
        appUserModelId: window.appUserModelId,
        packageFullName: window.packageFullName,
        pwaAppId: reused ? reused.item.pwaAppId : '',
        commandLineArguments: reused ? reused.item.commandLineArguments : '',
        workingDirectory: reused ? reused.item.workingDirectory : '',
        monitorIndex: resolveMonitorIndex(window.bounds, monitors),
        minimized: window.isMinimized ?? false,
        maximized: window.isMaximized ?? false,
        position: { ...window.bounds },
      });
      handles.set(id, window.handle);
    }

    if (applications.length === 0) return null;

    return {
      workspace: {
        id: previous?.id ?? this.createId(),
        name,
        creationTime: this.now(),
        lastLaunchedTime: previous?.lastLaunchedTime ?? 0,
        moveExistingWindows: previous?.moveExistingWindows ?? true,
        applications,
        monitors: monitors.map(toMonitorDefinition),
      },
      handles,
    };
  }
}
