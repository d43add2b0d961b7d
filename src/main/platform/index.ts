/**
 * platform/index.ts
 *
 * Exports the correct PlatformCapabilities implementation for the current OS.
 * Import from here, never from posix.ts or windows.ts directly.
 *
 *   import { platform } from './platform';
 *   const result = await platform.launch('notepad.exe', '', '');
 */

export type {
  AppLaunchService,
  DisplaySource,
  LaunchResult,
  MediaProperties,
  MediaSession,
  MediaSessionManager,
  NotificationSink,
  PlatformCapabilities,
  PlaybackStatus,
  WindowSource,
} from './interface';

import { posix } from './posix';
import { windows } from './windows';

export const platform =
  process.platform === 'win32' ? windows : posix;
