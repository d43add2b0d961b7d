/**
 * System Controls Provider
 *
 * Built-in "System Controls" group with a media play/pause button.
 *
 * - Follows the preferred OS media session: the current session when it is
 *   playing, else any playing session, else the current one.
 * - After a successful play/pause the new state is asserted optimistically
 *   for OPTIMISTIC_TTL_MS. Any authoritative playback notification clears
 *   the assertion.
 * - OS session events are coalesced into one group refresh per
 *   REFRESH_DEBOUNCE_MS; a successful command refreshes immediately.
 */

import { AsyncLock } from '../actions/async-lock';
import { ChangeChannel } from '../actions/change-channel';
import { isCancellation } from '../actions/cancellation';
import { groupUpdated } from '../actions/provider-events';
import {
  fail,
  ok,
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
import type { MediaSession, MediaSessionManager } from '../platform/interface';
import { loadSettings, type DefaultActionsSettings } from '../settings-store';
import { OptimisticState } from './optimistic-state';
import { RestartTimer } from './restart-timer';

export const SYSTEM_CONTROLS_PROVIDER_ID = 'SystemControlsProvider';
export const SYSTEM_CONTROLS_GROUP_ID = 'system-controls';
export const MEDIA_PLAY_PAUSE_ACTION_ID = 'media.playpause';
export const MEDIA_PLAY_PAUSE_BUTTON_ID = 'system-controls::media-play-pause';

const OPTIMISTIC_TTL_MS = 2000;
const REFRESH_DEBOUNCE_MS = 60;

const NO_MEDIA_TEXT = 'No active media. Start playback and control here.';
const PLAYING_TEXT = 'Media is playing. Click to pause.';
const PAUSED_TEXT = 'Media is paused. Click to play.';

export interface SystemControlsProviderOptions {
  sessions: MediaSessionManager | null;
  settings?: () => DefaultActionsSettings;
  now?: () => number;
}

interface MediaView {
  session: MediaSession | null;
  isPlaying: boolean;
  nowPlaying: string;
}

export function describeMedia(view: MediaView): string {
  if (!view.session) return NO_MEDIA_TEXT;
  const status = view.isPlaying ? PLAYING_TEXT : PAUSED_TEXT;
  return view.nowPlaying ? `${view.nowPlaying}\n${status}` : status;
}

function mediaIcon(view: MediaView): ActionIcon {
  if (!view.session) return { type: 'catalog', value: 'circle-slash' };
  return { type: 'catalog', value: view.isPlaying ? 'pause' : 'play' };
}

export class SystemControlsProvider implements GroupProvider, ChangeNotifyingProvider {
  readonly id = SYSTEM_CONTROLS_PROVIDER_ID;

  private readonly changes = new ChangeChannel<ProviderChangedEvent>();
  private readonly lock = new AsyncLock();
  private readonly optimistic: OptimisticState<boolean>;
  private readonly refreshTimer: RestartTimer;
  private readonly readSettings: () => DefaultActionsSettings;
  private readonly managerSubscriptions: Unsubscribe[] = [];
  private sessionSubscriptions: Unsubscribe[] = [];
  private trackedSession: MediaSession | null = null;
  private disposed = false;

  constructor(private readonly options: SystemControlsProviderOptions) {
    this.optimistic = new OptimisticState<boolean>(OPTIMISTIC_TTL_MS, options.now);
    this.refreshTimer = new RestartTimer(REFRESH_DEBOUNCE_MS, () => this.refreshNow(), 'media refresh');
    this.readSettings = options.settings ?? (() => loadSettings().defaultActions);

    const manager = options.sessions;
    if (manager) {
      const onSessionChange = () => {
        this.optimistic.clear();
        this.attachPreferredSession();
        this.queueRefresh();
      };
      this.managerSubscriptions.push(
        manager.onSessionsChanged(onSessionChange),
        manager.onCurrentSessionChanged(onSessionChange)
      );
      this.attachPreferredSession();
    }
  }

  async getInfo(): Promise<ProviderInfo> {
    return { name: 'System Controls', version: '1.0' };
  }

  onProviderChanged(listener: ProviderChangedListener): Unsubscribe {
    return this.changes.subscribe(listener);
  }

  // ─── Sessions ─────────────────────────────────────────────────────

  private getPreferredSession(): MediaSession | null {
    const manager = this.options.sessions;
    if (!manager) return null;
    const current = manager.getCurrentSession();
    if (current && current.getPlaybackStatus() === 'playing') return current;
    const playing = manager.getSessions().find((session) => session.getPlaybackStatus() === 'playing');
    return playing ?? current;
  }

  private attachPreferredSession(): void {
    const next = this.getPreferredSession();
    if (next === this.trackedSession) return;

    for (const release of this.sessionSubscriptions) release();
    this.sessionSubscriptions = [];
    this.trackedSession = next;
    if (!next) return;

    this.sessionSubscriptions.push(
      next.onPlaybackInfoChanged(() => {
        this.optimistic.clear();
        this.queueRefresh();
      }),
      next.onMediaPropertiesChanged(() => this.queueRefresh())
    );
  }

  /** Optimistic value when fresh, else what the session reports. */
  private isPlaying(session: MediaSession): boolean {
    const asserted = this.optimistic.get();
    if (asserted !== undefined) return asserted;
    return session.getPlaybackStatus() === 'playing';
  }

  private async readMediaView(): Promise<MediaView> {
    const session = this.getPreferredSession();
    if (!session) return { session: null, isPlaying: false, nowPlaying: '' };

    let nowPlaying = '';
    try {
      const properties = await session.getMediaProperties();
      const title = properties?.title.trim() ?? '';
      const artist = properties?.artist.trim() ?? '';
      nowPlaying = title && artist ? `${title} - ${artist}` : title;
    } catch (e) {
      console.warn('[SystemControls] Could not read media properties:', e);
    }
    return { session, isPlaying: this.isPlaying(session), nowPlaying };
  }

  // ─── Refresh ──────────────────────────────────────────────────────

  private queueRefresh(): void {
    if (this.disposed) return;
    this.refreshTimer.restart();
  }

  private refreshNow(): void {
    if (this.disposed) return;
    this.changes.emit(groupUpdated(this.id, SYSTEM_CONTROLS_GROUP_ID));
  }

  // ─── Discovery & groups ───────────────────────────────────────────

  async *discover(_context: ActionContext, signal?: AbortSignal): AsyncIterable<ActionDescriptor> {
    const settings = this.readSettings();
    if (!settings.systemControlsEnabled || signal?.aborted) return;

    const view = await this.readMediaView();
    if (signal?.aborted) return;

    yield {
      id: MEDIA_PLAY_PAUSE_ACTION_ID,
      providerId: this.id,
      title: 'Play/Pause',
      subtitle: describeMedia(view),
      kind: 'command',
      groupHint: SYSTEM_CONTROLS_GROUP_ID,
      order: 0,
      icon: mediaIcon(view),
      canExecute: settings.mediaPlayPauseEnabled,
      keywords: ['media', 'play', 'pause', 'music'],
    };
  }

  async createGroup(_context: ActionContext, signal?: AbortSignal): Promise<ButtonGroup> {
    const settings = this.readSettings();
    const buttons: ToolbarButton[] = [];

    if (settings.systemControlsEnabled && settings.mediaPlayPauseEnabled) {
      const view = await this.readMediaView();
      signal?.throwIfAborted();
      buttons.push({
        id: MEDIA_PLAY_PAUSE_BUTTON_ID,
        name: 'Play/Pause',
        description: describeMedia(view),
        icon: mediaIcon(view),
        isEnabled: true,
        isDimmed: !view.session,
        action: {
          type: 'provider',
          providerId: this.id,
          providerActionId: MEDIA_PLAY_PAUSE_ACTION_ID,
        },
      });
    }

    return {
      id: SYSTEM_CONTROLS_GROUP_ID,
      name: 'System Controls',
      description: 'Built-in system controls',
      isEnabled: settings.systemControlsEnabled,
      layout: { style: 'icon', overflow: 'wrap', maxInline: 4 },
      buttons,
      providerId: this.id,
    };
  }

  // ─── Actions ──────────────────────────────────────────────────────

  async invoke(
    actionId: string,
    _args: unknown,
    _context: ActionContext,
    _progress?: ProgressSink,
    signal?: AbortSignal
  ): Promise<ActionResult> {
    if (!equalsIgnoreCase(String(actionId || '').trim(), MEDIA_PLAY_PAUSE_ACTION_ID)) {
      return fail('Unknown system-controls action.');
    }
    const settings = this.readSettings();
    if (!settings.systemControlsEnabled || !settings.mediaPlayPauseEnabled) {
      return fail('System controls action is disabled in settings.');
    }

    return this.lock.run(async () => {
      try {
        signal?.throwIfAborted();
        const session = this.getPreferredSession();
        if (!session) return ok('No active media session. Start playback and control here.');

        const wasPlaying = this.isPlaying(session);
        const accepted = wasPlaying ? await session.tryPause() : await session.tryPlay();
        if (!accepted) return fail('Media command failed.');

        this.optimistic.set(!wasPlaying);
        this.refreshTimer.cancel();
        this.refreshNow();
        return ok();
      } catch (e) {
        if (isCancellation(e, signal)) throw e;
        console.error('[SystemControls] Play/pause failed:', e);
        return fail(e instanceof Error ? e.message : String(e));
      }
    });
  }

  dispose(): void {
    this.disposed = true;
    this.refreshTimer.cancel();
    for (const release of this.managerSubscriptions) release();
    for (const release of this.sessionSubscriptions) release();
    this.managerSubscriptions.length = 0;
    this.sessionSubscriptions = [];
    this.trackedSession = null;
    this.changes.clear();
  }
}
