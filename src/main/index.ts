/**
 * Toolbar host composition.
 *
 * Wires one ProviderRuntime with the builtin providers, the workspace
 * services they sit on, and the action executor, and exposes the
 * renderer-facing bridge. Everything is constructed here and passed down;
 * nothing below reaches for a global instance.
 */

import { ToolbarActionExecutor, type ButtonState } from './actions/action-executor';
import { registerBuiltinProviders, type ProviderFactory } from './actions/builtin-providers';
import { ChangeChannel } from './actions/change-channel';
import { ProviderRuntime } from './actions/provider-runtime';
import { consoleNotifications } from './notifications';
import { platform as defaultPlatform } from './platform';
import type { NotificationSink, PlatformCapabilities } from './platform/interface';
import { SystemControlsProvider } from './providers/system-controls-provider';
import { WorkspaceProvider } from './providers/workspace-provider';
import { loadSettings } from './settings-store';
import { createToolbarBridge, type ToolbarBridge } from './toolbar-bridge';
import { ToolbarConfigStore, getToolbarConfigPath } from './toolbar-config-store';
import { WorkspaceButtonStore } from './workspaces/button-store';
import { WorkspaceDefinitionStore } from './workspaces/definition-store';
import { WorkspaceLauncher } from './workspaces/launcher';
import { ManagedWindowRegistry } from './workspaces/managed-window-registry';
import { WorkspaceSnapshotter } from './workspaces/snapshotter';
import { getWorkspaceButtonsPath, getWorkspaceDefinitionsPath } from './workspaces/storage-paths';
import { createWindowMatcher } from './workspaces/window-matcher';

export interface ToolbarHostOptions {
  platform?: PlatformCapabilities;
  notifications?: NotificationSink;
  /** Watch the workspace files for external edits. Defaults to true. */
  watch?: boolean;
  /** Static toolbar configuration file. Defaults to `toolbar.json` in the user-data directory. */
  toolbarConfigPath?: string;
}

export interface ToolbarHost {
  runtime: ProviderRuntime;
  workspaces: WorkspaceProvider | null;
  executor: ToolbarActionExecutor;
  toolbarConfig: ToolbarConfigStore;
  bridge: ToolbarBridge;
  dispose(): void;
}

export function createToolbarHost(options: ToolbarHostOptions = {}): ToolbarHost {
  const host = options.platform ?? defaultPlatform;
  const settings = loadSettings();
  const debug = () => loadSettings().debugMode;

  const matcher = createWindowMatcher(settings.matchWeights);
  const registry = new ManagedWindowRegistry();
  const definitions = new WorkspaceDefinitionStore(getWorkspaceDefinitionsPath());
  const buttons = new WorkspaceButtonStore(getWorkspaceButtonsPath());

  const runtime = new ProviderRuntime();
  let workspaces: WorkspaceProvider | null = null;

  const factories: ProviderFactory[] = [
    {
      id: 'WorkspaceProvider',
      create: () => {
        workspaces = new WorkspaceProvider({
          definitions,
          buttons,
          snapshotter: new WorkspaceSnapshotter({
            windows: host,
            displays: host,
            definitions,
            buttons,
            registry,
            matcher,
          }),
          launcher: new WorkspaceLauncher({
            windows: host,
            launcher: host,
            definitions,
            registry,
            matcher,
            windowTimeoutMs: settings.workspaces.launchWindowTimeoutMs,
            debug,
          }),
          reloadDebounceMs: settings.workspaces.reloadDebounceMs,
          watch: options.watch ?? true,
        });
        return workspaces;
      },
    },
    {
      id: 'SystemControlsProvider',
      create: () => new SystemControlsProvider({ sessions: host.createMediaSessionManager() }),
    },
  ];

  const registered = registerBuiltinProviders(runtime, factories, settings.disabledProviders);
  console.log(`[ProviderRuntime] Registered providers: ${registered.join(', ') || '(none)'}`);

  const buttonStates = new ChangeChannel<{ buttonId: string; state: ButtonState }>();
  const executor = new ToolbarActionExecutor({
    runtime,
    launcher: host,
    notifications: options.notifications ?? consoleNotifications,
    onButtonState: (buttonId, state) => buttonStates.emit({ buttonId, state }),
  });

  const toolbarConfig = new ToolbarConfigStore(options.toolbarConfigPath ?? getToolbarConfigPath());
  const bridge = createToolbarBridge(
    runtime,
    executor,
    (listener) => buttonStates.subscribe(({ buttonId, state }) => listener(buttonId, state)),
    () => toolbarConfig.loadGroups()
  );

  return {
    runtime,
    workspaces,
    executor,
    toolbarConfig,
    bridge,
    dispose() {
      runtime.dispose();
      buttonStates.clear();
    },
  };
}

export { ProviderRuntime } from './actions/provider-runtime';
export { searchActions } from './actions/action-search';
export type * from './actions/types';
export type { ToolbarBridge } from './toolbar-bridge';
export type { LaunchReport } from './workspaces/launcher';
export type { WorkspaceDefinition, ApplicationDefinition, WindowInfo } from './workspaces/types';
export { createWindowMatcher, getMatchScore, isMatch, isTitleOnlyMatch } from './workspaces/window-matcher';
