/**
 * Workspace Launcher
 *
 * Brings a saved workspace back to life, one application at a time:
 *   1. reuse the window already bound to the application if it still matches;
 *   2. otherwise claim the best-scoring window nobody owns yet;
 *   3. otherwise start the application and poll until a matching window
 *      shows up or the timeout passes.
 * Steps 1 and 2 only run when the workspace has `moveExistingWindows` set;
 * otherwise every application is started fresh.
 *
 * Window geometry is not restored; the report says which windows were found.
 */

import { delay, isCancellation, throwIfAborted } from '../actions/cancellation';
import { hasText } from '../json-values';
import type { AppLaunchService, WindowSource } from '../platform/interface';
import type { WorkspaceDefinitionStore } from './definition-store';
import type { ManagedWindowRegistry } from './managed-window-registry';
import { isFrameHostPath, type WindowMatcher } from './window-matcher';
import { findBestWindow } from './window-resolver';
import { createRecordId, type ApplicationDefinition, type DesktopWindow } from './types';

export type AppLaunchStatus = 'reused' | 'claimed' | 'launched' | 'failed';

export interface AppLaunchOutcome {
  appId: string;
  label: string;
  status: AppLaunchStatus;
  handle: string | null;
  titleOnly: boolean;
  error?: string;
}

export interface LaunchReport {
  workspaceId: string;
  ok: boolean;
  message: string;
  apps: AppLaunchOutcome[];
}

export interface LauncherDeps {
  windows: WindowSource;
  launcher: AppLaunchService;
  definitions: WorkspaceDefinitionStore;
  registry: ManagedWindowRegistry;
  matcher: WindowMatcher;
  windowTimeoutMs?: number;
  pollIntervalMs?: number;
  debug?: () => boolean;
  createId?: () => string;
}

const DEFAULT_WINDOW_TIMEOUT_MS = 8000;
const DEFAULT_POLL_INTERVAL_MS = 250;

function describeApp(app: ApplicationDefinition): string {
  return app.name || app.title || app.appUserModelId || app.path || app.id;
}

/** What to hand the launch service: packaged apps go through AppsFolder. */
export function resolveLaunchTarget(app: ApplicationDefinition): { command: string; args: string } | null {
  if (hasText(app.appUserModelId)) {
    return { command: `shell:AppsFolder\\${app.appUserModelId.trim()}`, args: '' };
  }
  if (hasText(app.path) && !isFrameHostPath(app.path)) {
    return { command: app.path.trim(), args: app.commandLineArguments };
  }
  return null;
}

function summarize(outcomes: AppLaunchOutcome[]): { ok: boolean; message: string } {
  if (outcomes.length === 0) return { ok: false, message: 'Workspace has no applications to launch.' };
  const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;
  if (failed === 0) return { ok: true, message: 'Workspace ready.' };
  if (failed === outcomes.length) return { ok: false, message: 'No applications could be started.' };
  return {
    ok: true,
    message: `Workspace ready; ${failed} of ${outcomes.length} applications could not be started.`,
  };
}

export class WorkspaceLauncher {
  constructor(private readonly deps: LauncherDeps) {}

  private logDebug(message: string): void {
    if (this.deps.debug?.()) console.log(`[Workspaces] ${message}`);
  }

  async launch(workspaceId: string, signal?: AbortSignal): Promise<LaunchReport> {
    const workspace = await this.deps.definitions.loadById(workspaceId);
    if (!workspace) {
      console.warn(`[Workspaces] Workspace "${workspaceId}" not found.`);
      return { workspaceId, ok: false, message: `Workspace "${workspaceId}" was not found.`, apps: [] };
    }

    // Applications saved without an id get one for the lifetime of this launch.
    const createId = this.deps.createId ?? createRecordId;
    const apps = workspace.applications.map((app) => (hasText(app.id) ? app : { ...app, id: createId() }));
    if (apps.length === 0) {
      console.warn(`[Workspaces] Workspace "${workspace.id}" has no applications to launch.`);
    }

    const outcomes: Array<AppLaunchOutcome | null> = apps.map(() => null);
    if (workspace.moveExistingWindows) {
      for (const [index, app] of apps.entries()) {
        throwIfAborted(signal);
        outcomes[index] = await this.tryAssignExisting(workspace.id, app);
      }
    }

    for (const [index, app] of apps.entries()) {
      if (outcomes[index]) continue;
      throwIfAborted(signal);
      outcomes[index] = await this.launchNew(workspace.id, app, signal);
    }

    const ordered = outcomes.filter((outcome): outcome is AppLaunchOutcome => outcome !== null);
    for (const outcome of ordered) {
      if (outcome.titleOnly) {
        console.warn(`[Workspaces] "${outcome.label}" matched on window title only.`);
      }
    }

    const summary = summarize(ordered);
    if (ordered.some((outcome) => outcome.status !== 'failed')) {
      await this.deps.definitions.updateLastLaunchedTime(workspace.id);
    }
    return { workspaceId: workspace.id, ...summary, apps: ordered };
  }

  private async tryAssignExisting(
    workspaceId: string,
    app: ApplicationDefinition
  ): Promise<AppLaunchOutcome | null> {
    const { registry, matcher } = this.deps;
    const label = describeApp(app);
    const windows = await this.deps.windows.listWindows();

    const boundHandle = registry.getBoundWindow(app.id);
    if (boundHandle) {
      const bound = windows.find((window) => window.handle === boundHandle);
      if (bound && matcher.isMatch(bound, app)) {
        this.logDebug(`[${label}] reusing bound window ${boundHandle}`);
        return this.outcome(app, 'reused', bound);
      }
      registry.unbindWindow(boundHandle);
      this.logDebug(`[${label}] bound window ${boundHandle} is gone or no longer matches`);
    }

    const best = findBestWindow(windows, app, matcher, (window) => !registry.isBound(window.handle));
    if (!best || !registry.tryBind(workspaceId, app.id, best.item.handle)) return null;

    this.logDebug(`[${label}] claimed window ${best.item.handle} (score ${best.score})`);
    return this.outcome(app, 'claimed', best.item);
  }

  private async launchNew(
    workspaceId: string,
    app: ApplicationDefinition,
    signal?: AbortSignal
  ): Promise<AppLaunchOutcome> {
    const label = describeApp(app);
    const target = resolveLaunchTarget(app);
    if (!target) {
      return { ...this.outcome(app, 'failed', null), error: 'Application cannot be launched directly.' };
    }

    try {
      const started = await this.deps.launcher.launch(target.command, target.args, app.workingDirectory);
      if (!started.ok) {
        console.error('Failed to launch application:', label, started.error ?? '');
        return { ...this.outcome(app, 'failed', null), error: started.error ?? 'Launch failed.' };
      }

      const window = await this.waitForWindow(app, signal);
      if (!window || !this.deps.registry.tryBind(workspaceId, app.id, window.handle)) {
        this.logDebug(`[${label}] no window appeared in time`);
        return { ...this.outcome(app, 'failed', null), error: 'Timed out waiting for the application window.' };
      }
      this.logDebug(`[${label}] launched and claimed window ${window.handle}`);
      return this.outcome(app, 'launched', window);
    } catch (e) {
      if (isCancellation(e, signal)) throw e;
      console.error('Failed to launch application:', label, e);
      return {
        ...this.outcome(app, 'failed', null),
        error: e instanceof Error ? e.message : String(e),
      };
    }
  }

  private async waitForWindow(
    app: ApplicationDefinition,
    signal?: AbortSignal
  ): Promise<DesktopWindow | null> {
    const timeoutMs = this.deps.windowTimeoutMs ?? DEFAULT_WINDOW_TIMEOUT_MS;
    const pollMs = this.deps.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const windows = await this.deps.windows.listWindows();
      const best = findBestWindow(
        windows,
        app,
        this.deps.matcher,
        (window) => !this.deps.registry.isBound(window.handle)
      );
      if (best) return best.item;
      if (Date.now() >= deadline) return null;
      await delay(pollMs, signal);
    }
  }

  private outcome(
    app: ApplicationDefinition,
    status: AppLaunchStatus,
    window: DesktopWindow | null
  ): AppLaunchOutcome {
    return {
      appId: app.id,
      label: describeApp(app),
      status,
      handle: window?.handle ?? null,
      titleOnly: window ? this.deps.matcher.isTitleOnlyMatch(window, app) : false,
    };
  }
}
