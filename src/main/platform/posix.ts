/**
 * platform/posix.ts
 *
 * macOS and Linux implementation of PlatformCapabilities.
 * Desktop enumeration has no portable API on these platforms, so windows and
 * monitors come back empty and snapshots capture nothing.
 */

import type {
  LaunchResult,
  MediaSessionManager,
  PlatformCapabilities,
} from './interface';
import type { DesktopMonitor, DesktopWindow } from '../workspaces/types';
import { spawnDetached, splitCommandLine } from './spawn-detached';

export const posix: PlatformCapabilities = {
  name: process.platform === 'darwin' ? 'darwin' : 'linux',
  currentProcessId: process.pid,

  async launch(command: string, args: string, workingDirectory: string): Promise<LaunchResult> {
    const target = command.trim();
    if (!target) return { ok: false, error: 'No command to launch.' };

    const argv = splitCommandLine(args);
    if (process.platform === 'darwin' && /\.app\/?$/i.test(target)) {
      const openArgs = ['-a', target, ...(argv.length ? ['--args', ...argv] : [])];
      return spawnDetached('open', openArgs, workingDirectory);
    }
    return spawnDetached(target, argv, workingDirectory);
  },

  async listWindows(): Promise<DesktopWindow[]> {
    return [];
  },

  async listMonitors(): Promise<DesktopMonitor[]> {
    return [];
  },

  createMediaSessionManager(): MediaSessionManager | null {
    return null;
  },
};
