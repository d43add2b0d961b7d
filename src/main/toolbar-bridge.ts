/**
 * The surface the renderer talks to. In the desktop shell this crosses the
 * IPC boundary; tests and the headless host call it in-process.
 */

import type { ButtonState, ToolbarActionExecutor } from './actions/action-executor';
import type { ProviderRuntime } from './actions/provider-runtime';
import type {
  ActionContext,
  ActionResult,
  ButtonGroup,
  CreateGroupResult,
  ProviderChangedListener,
  ToolbarButton,
  Unsubscribe,
} from './actions/types';

export interface ToolbarBridge {
  providerIds(): Promise<string[]>;
  /** Groups from the static toolbar configuration, drawn ahead of provider groups. */
  staticGroups(): Promise<ButtonGroup[]>;
  createGroup(providerId: string, signal?: AbortSignal): Promise<CreateGroupResult>;
  execute(button: ToolbarButton, signal?: AbortSignal): Promise<ActionResult>;
  onProvidersChanged(listener: ProviderChangedListener): Unsubscribe;
  onButtonState(listener: (buttonId: string, state: ButtonState) => void): Unsubscribe;
}

export function createToolbarBridge(
  runtime: ProviderRuntime,
  executor: ToolbarActionExecutor,
  subscribeButtonState: (listener: (buttonId: string, state: ButtonState) => void) => Unsubscribe,
  loadStaticGroups: () => Promise<ButtonGroup[]> = async () => [],
  context: ActionContext = { source: 'toolbar' }
): ToolbarBridge {
  return {
    async providerIds() {
      return runtime.providerIds();
    },
    staticGroups() {
      return loadStaticGroups();
    },
    createGroup(providerId, signal) {
      return runtime.createGroup(providerId, context, signal);
    },
    execute(button, signal) {
      return executor.execute(button, context, signal);
    },
    onProvidersChanged(listener) {
      return runtime.onProvidersChanged(listener);
    },
    onButtonState(listener) {
      return subscribeButtonState(listener);
    },
  };
}
