/**
 * Workspace data model: persisted definitions, per-workspace button metadata,
 * and the live window samples they are matched against.
 */

import * as crypto from 'crypto';

export interface Rect {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface ApplicationDefinition {
  id: string;
  name: string;
  path: string;
  title: string;
  appUserModelId: string;
  packageFullName: string;
  pwaAppId: string;
  commandLineArguments: string;
  workingDirectory: string;
  monitorIndex: number;
  minimized: boolean;
  maximized: boolean;
  position: Rect;
}

export interface MonitorDefinition {
  id: string;
  instanceId: string;
  number: number;
  dpi: number;
  rect: Rect;
}

export interface WorkspaceDefinition {
  id: string;
  name: string;
  /** Unix seconds. */
  creationTime: number;
  /** Unix seconds; 0 when never launched. */
  lastLaunchedTime: number;
  moveExistingWindows: boolean;
  applications: ApplicationDefinition[];
  monitors: MonitorDefinition[];
}

export type ProviderIconType = 'glyph' | 'image' | 'catalog';

export interface ProviderIcon {
  type: ProviderIconType;
  path: string;
  glyph: string;
  catalogId: string;
}

export interface WorkspaceButtonConfig {
  id: string;
  workspaceId: string;
  name: string;
  description: string;
  enabled: boolean;
  sortOrder: number | null;
  icon: ProviderIcon | null;
}

export interface WorkspaceButtonDocument {
  schemaVersion: number;
  providerId: string;
  displayName: string;
  enabled: boolean;
  /** ISO timestamp stamped on every save. */
  lastUpdated: string;
  buttons: WorkspaceButtonConfig[];
}

/** The identity-bearing fields of a live window. */
export interface WindowInfo {
  title: string;
  processName: string;
  processPath: string;
  processFileName: string;
  appUserModelId: string;
  packageFullName: string;
}

/** A window as reported by desktop enumeration. */
export interface DesktopWindow extends WindowInfo {
  handle: string;
  processId: number;
  isVisible: boolean;
  isToolWindow: boolean;
  isMinimized?: boolean;
  isMaximized?: boolean;
  className: string;
  bounds: Rect;
}

export interface DesktopMonitor {
  id: string;
  instanceId: string;
  number: number;
  dpi: number;
  bounds: Rect;
}

export function emptyRect(): Rect {
  return { left: 0, top: 0, width: 0, height: 0 };
}

/** Dashless random id used for new workspaces and applications. */
export function createRecordId(): string {
  return crypto.randomUUID().replace(/-/g, '');
}

export function createApplicationDefinition(
  fields: Partial<ApplicationDefinition> = {}
): ApplicationDefinition {
  return {
    id: '',
    name: '',
    path: '',
    title: '',
    appUserModelId: '',
    packageFullName: '',
    pwaAppId: '',
    commandLineArguments: '',
    workingDirectory: '',
    monitorIndex: 0,
    minimized: false,
    maximized: false,
    ...fields,
    position: { ...emptyRect(), ...fields.position },
  };
}

export function createWindowInfo(fields: Partial<WindowInfo> = {}): WindowInfo {
  return {
    title: '',
    processName: '',
    processPath: '',
    processFileName: '',
    appUserModelId: '',
    packageFullName: '',
    ...fields,
  };
}
