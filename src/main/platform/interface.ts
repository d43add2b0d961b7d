/**
 * platform/interface.ts
 *
 * Contract every platform implementation must satisfy, plus the OS-facing
 * collaborators the providers consume. Providers receive these by injection
 * so tests can pass in-process fakes.
 * Host code imports from platform/index.ts, never from posix.ts or windows.ts directly.
 */

import type { Unsubscribe } from '../actions/types';
import type { DesktopMonitor, DesktopWindow } from '../workspaces/types';

// ── Process launch ───────────────────────────────────────────────────────────

export interface LaunchResult {
  ok: boolean;
  error?: string;
}

export interface AppLaunchService {
  /**
   * Start `command` detached from the toolbar. `args` is a single command-line
   * string; `workingDirectory` may be empty.
   */
  launch(command: string, args: string, workingDirectory: string): Promise<LaunchResult>;
}

// ── Desktop enumeration ──────────────────────────────────────────────────────

export interface WindowSource {
  /** Top-level windows in z-order. */
  listWindows(): Promise<DesktopWindow[]>;
  /** Pid of the toolbar itself, so its own windows are never captured. */
  readonly currentProcessId: number;
}

export interface DisplaySource {
  listMonitors(): Promise<DesktopMonitor[]>;
}

// ── Media sessions ───────────────────────────────────────────────────────────

export type PlaybackStatus = 'playing' | 'paused' | 'stopped' | 'unknown';

export interface MediaProperties {
  title: string;
  artist: string;
}

export interface MediaSession {
  readonly id: string;
  getPlaybackStatus(): PlaybackStatus;
  getMediaProperties(): Promise<MediaProperties | null>;
  /** Resolves false when the session rejected the command. */
  tryPlay(): Promise<boolean>;
  tryPause(): Promise<boolean>;
  onPlaybackInfoChanged(listener: () => void): Unsubscribe;
  onMediaPropertiesChanged(listener: () => void): Unsubscribe;
}

export interface MediaSessionManager {
  getCurrentSession(): MediaSession | null;
  getSessions(): MediaSession[];
  onSessionsChanged(listener: () => void): Unsubscribe;
  onCurrentSessionChanged(listener: () => void): Unsubscribe;
}

// ── Notifications ────────────────────────────────────────────────────────────

export interface NotificationSink {
  showError(message: string): void;
  showSuccess(message: string): void;
}

// ── Platform interface ───────────────────────────────────────────────────────

export interface PlatformCapabilities extends AppLaunchService, WindowSource, DisplaySource {
  readonly name: string;
  /**
   * OS media session access. Returns null where no session manager is
   * available; the system controls provider then reports no active media.
   */
  createMediaSessionManager(): MediaSessionManager | null;
}
