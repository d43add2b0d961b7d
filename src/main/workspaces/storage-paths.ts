import * as path from 'path';
import { getProvidersDir, getUserDataDir } from '../app-paths';
import { loadSettings } from '../settings-store';

export const WORKSPACE_PROVIDER_ID = 'WorkspaceProvider';

export function getWorkspaceDefinitionsPath(): string {
  const override = loadSettings().workspaces.definitionsPath;
  if (override) return override;
  return path.join(getUserDataDir(), 'workspaces', 'workspaces.json');
}

export function getWorkspaceButtonsPath(): string {
  const override = loadSettings().workspaces.buttonsPath;
  if (override) return override;
  return path.join(getProvidersDir(), `${WORKSPACE_PROVIDER_ID}.json`);
}
