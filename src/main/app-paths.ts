/**
 * Resolves the per-user data directory that every store writes into.
 *
 * TOOLBAR_USER_DATA_DIR overrides the default so tests and portable installs
 * can point the toolbar at their own folder.
 */

import * as os from 'os';
import * as path from 'path';

const APP_DIR_NAME = 'desk-toolbar';

export function getUserDataDir(): string {
  const override = String(process.env.TOOLBAR_USER_DATA_DIR || '').trim();
  if (override) return override;

  if (process.platform === 'win32') {
    const appData = process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');
    return path.join(appData, APP_DIR_NAME);
  }
  if (process.platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', APP_DIR_NAME);
  }
  const configHome = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(configHome, APP_DIR_NAME);
}

export function getProvidersDir(): string {
  return path.join(getUserDataDir(), 'providers');
}
