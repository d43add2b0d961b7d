/**
 * platform/windows.ts
 *
 * Windows implementation of PlatformCapabilities.
 * Window/monitor enumeration and media sessions need the native helper,
 * which is not bundled here; those return safe empty values.
 */

import type {
  LaunchResult,
  MediaSessionManager,
  PlatformCapabilities,
} from './interface';
import type { DesktopMonitor, DesktopWindow } from '../workspaces/types';
import { spawnDetached, splitCommandLine } from './spawn-detached';

export const windows: PlatformCapabilities = {
  name: 'windows',
  currentProcessId: process.pid,

  async launch(command: string, args: string, workingDirectory: string): Promise<LaunchResult> {
    const target = command.trim();
    if (!target) return { ok: false, error: 'No command to launch.' };

    // Packaged apps and other shell monikers go through Explorer.
    if (target.toLowerCase().startsWith('shell:')) {
      return spawnDetached('explorer.exe', [target], workingDirectory);
    }
    return spawnDetached(target, splitCommandLine(args), workingDirectory);
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
