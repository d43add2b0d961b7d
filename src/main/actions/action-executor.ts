/**
 * Runs a toolbar button's action.
 *
 * Provider actions are routed through the runtime with their JSON arguments
 * parsed and progress mirrored into the button's state; command-line actions
 * go straight to the launch service. Failures surface as an error toast
 * `"<button>: <detail>"`. Cancellation marks the button and propagates.
 */

import { isCancellation } from './cancellation';
import type { ProviderRuntime } from './provider-runtime';
import {
  fail,
  ok,
  type ActionContext,
  type ActionProgress,
  type ActionResult,
  type ToolbarButton,
} from './types';
import type { AppLaunchService, NotificationSink } from '../platform/interface';
import { WORKSPACE_PROVIDER_ID } from '../workspaces/storage-paths';

export interface ButtonState {
  busy: boolean;
  progress: ActionProgress | null;
  statusMessage: string;
}

export type ButtonStateListener = (buttonId: string, state: ButtonState) => void;

export interface ActionExecutorDeps {
  runtime: ProviderRuntime;
  launcher: AppLaunchService;
  notifications: NotificationSink;
  onButtonState?: ButtonStateListener;
}

export function formatFailure(buttonName: string, detail: string): string {
  const trimmed = detail.trim();
  if (!trimmed) return 'Action failed.';
  return buttonName.trim() ? `${buttonName.trim()}: ${trimmed}` : trimmed;
}

/** Parses provider arguments; malformed JSON is logged and ignored. */
export function parseArguments(argumentsJson: string | undefined): unknown {
  if (!argumentsJson || !argumentsJson.trim()) return undefined;
  try {
    return JSON.parse(argumentsJson);
  } catch (e) {
    console.warn('Failed to parse provider arguments:', e);
    return undefined;
  }
}

export class ToolbarActionExecutor {
  constructor(private readonly deps: ActionExecutorDeps) {}

  private setState(buttonId: string, state: ButtonState): void {
    this.deps.onButtonState?.(buttonId, state);
  }

  async execute(
    button: ToolbarButton,
    context: ActionContext,
    signal?: AbortSignal
  ): Promise<ActionResult> {
    this.setState(button.id, { busy: true, progress: null, statusMessage: '' });

    let result: ActionResult;
    try {
      result = await this.run(button, context, signal);
    } catch (e) {
      if (isCancellation(e, signal)) {
        this.setState(button.id, { busy: false, progress: null, statusMessage: 'Cancelled.' });
        throw e;
      }
      console.error(`[ActionExecutor] "${button.name}" threw:`, e);
      result = fail(e instanceof Error ? e.message : String(e));
    }

    this.setState(button.id, { busy: false, progress: null, statusMessage: result.message });

    if (!result.ok) {
      this.deps.notifications.showError(formatFailure(button.name, result.message));
    } else if (
      button.action.type === 'provider' &&
      button.action.providerId.toLowerCase() === WORKSPACE_PROVIDER_ID.toLowerCase()
    ) {
      this.deps.notifications.showSuccess(result.message || 'Workspace ready.');
    }
    return result;
  }

  private async run(
    button: ToolbarButton,
    context: ActionContext,
    signal?: AbortSignal
  ): Promise<ActionResult> {
    const action = button.action;
    if (action.type === 'command-line') {
      const launched = await this.deps.launcher.launch(
        action.command,
        action.arguments,
        action.workingDirectory
      );
      return launched.ok ? ok() : fail(launched.error ?? '');
    }

    return this.deps.runtime.invoke(
      action.providerId,
      action.providerActionId,
      parseArguments(action.argumentsJson),
      context,
      (progress) => this.setState(button.id, { busy: true, progress, statusMessage: progress.note ?? '' }),
      signal
    );
  }
}
