/**
 * Shared types for the action provider runtime.
 *
 * Providers produce ActionDescriptors during discovery, optionally project
 * themselves into a ButtonGroup for the toolbar, and run actions through
 * invoke(). Everything here is plain data so it can cross the main/renderer
 * boundary unchanged.
 */

// ─── Descriptors & results ──────────────────────────────────────────

export type ActionKind = 'command' | 'launch';

export type IconType = 'glyph' | 'image' | 'catalog';

export interface ActionIcon {
  type: IconType;
  /** Glyph character, image path or catalog id depending on `type`. */
  value: string;
}

export interface ActionDescriptor {
  id: string;
  providerId: string;
  title: string;
  subtitle: string;
  kind: ActionKind;
  groupHint: string;
  order: number;
  icon: ActionIcon | null;
  canExecute: boolean;
  keywords: string[];
}

export interface ActionResult {
  ok: boolean;
  message: string;
}

export interface ActionProgress {
  percent?: number;
  note?: string;
}

export type ProgressSink = (progress: ActionProgress) => void;

/** Ambient information handed to every provider call. */
export interface ActionContext {
  /** Screen area the toolbar is currently docked on, when known. */
  monitorIndex?: number;
  /** Free-form origin tag, e.g. 'toolbar', 'search', 'test'. */
  source?: string;
}

export interface ProviderInfo {
  name: string;
  version: string;
}

// ─── Toolbar projection ─────────────────────────────────────────────

export type GroupLayoutStyle = 'capsule' | 'icon' | 'list';
export type GroupOverflow = 'menu' | 'wrap';

export interface GroupLayout {
  style: GroupLayoutStyle;
  overflow: GroupOverflow;
  maxInline: number;
}

export type ToolbarAction =
  | {
      type: 'provider';
      providerId: string;
      providerActionId: string;
      argumentsJson?: string;
    }
  | {
      type: 'command-line';
      command: string;
      arguments: string;
      workingDirectory: string;
    };

export interface ToolbarButton {
  id: string;
  name: string;
  description: string;
  icon: ActionIcon | null;
  isEnabled: boolean;
  isDimmed: boolean;
  action: ToolbarAction;
}

export interface ButtonGroup {
  id: string;
  name: string;
  description: string;
  isEnabled: boolean;
  layout: GroupLayout;
  buttons: ToolbarButton[];
  /** Set by the runtime so the UI can route refreshes back to the provider. */
  providerId: string;
}

export interface CreateGroupResult {
  group: ButtonGroup | null;
  error: string | null;
}

// ─── Change notification ────────────────────────────────────────────

export type ProviderChangeKind =
  | 'actions-added'
  | 'actions-removed'
  | 'actions-updated'
  | 'group-updated'
  | 'bulk-refresh'
  | 'reset'
  | 'provider-registered';

export interface ProviderChangedEvent {
  providerId: string;
  kind: ProviderChangeKind;
  affectedIds: string[];
}

export type ProviderChangedListener = (event: ProviderChangedEvent) => void;

export type Unsubscribe = () => void;

// ─── Provider contract ──────────────────────────────────────────────

export interface ActionProvider {
  readonly id: string;
  getInfo(signal?: AbortSignal): Promise<ProviderInfo>;
  discover(context: ActionContext, signal?: AbortSignal): AsyncIterable<ActionDescriptor>;
  invoke(
    actionId: string,
    args: unknown,
    context: ActionContext,
    progress?: ProgressSink,
    signal?: AbortSignal
  ): Promise<ActionResult>;
  dispose?(): void;
}

/** Optional capability: the provider can project itself into a toolbar group. */
export interface GroupProvider extends ActionProvider {
  createGroup(context: ActionContext, signal?: AbortSignal): Promise<ButtonGroup>;
}

/** Optional capability: the provider raises change notifications. */
export interface ChangeNotifyingProvider extends ActionProvider {
  onProviderChanged(listener: ProviderChangedListener): Unsubscribe;
}

export function isGroupProvider(provider: ActionProvider): provider is GroupProvider {
  return 'createGroup' in provider && typeof provider.createGroup === 'function';
}

export function isChangeNotifyingProvider(
  provider: ActionProvider
): provider is ChangeNotifyingProvider {
  return 'onProviderChanged' in provider && typeof provider.onProviderChanged === 'function';
}

export function ok(message = ''): ActionResult {
  return { ok: true, message };
}

export function fail(message: string): ActionResult {
  return { ok: false, message };
}
