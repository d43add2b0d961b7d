/**
 * Settings Store
 *
 * What this file is:
 * - The single persistence layer for toolbar settings.
 *
 * What it does:
 * - Loads/saves normalized settings JSON.
 * - Falls back to defaults for missing, malformed or out-of-range values.
 * - Keeps an in-memory copy so providers can read settings on every call.
 *
 * Why we need it:
 * - Providers consult feature toggles on every discover/invoke, and a broken
 *   settings file must never stop the toolbar from starting.
 */

import * as fs from 'fs';
import * as path from 'path';
import { getUserDataDir } from './app-paths';
import {
  asArray,
  asBoolean,
  asFiniteNumber,
  asTrimmedString,
  isRecord,
} from './json-values';
import type { MatchWeights } from './workspaces/window-matcher';

export interface DefaultActionsSettings {
  systemControlsEnabled: boolean;
  mediaPlayPauseEnabled: boolean;
}

export interface WorkspaceSettings {
  /** Overrides the workspace definitions file; empty means the default location. */
  definitionsPath: string;
  /** Overrides the workspace button config file; empty means the default location. */
  buttonsPath: string;
  reloadDebounceMs: number;
  launchWindowTimeoutMs: number;
}

export interface ToolbarSettings {
  defaultActions: DefaultActionsSettings;
  workspaces: WorkspaceSettings;
  matchWeights: Partial<MatchWeights>;
  disabledProviders: string[];
  debugMode: boolean;
}

const DEFAULT_SETTINGS: ToolbarSettings = {
  defaultActions: {
    systemControlsEnabled: true,
    mediaPlayPauseEnabled: true,
  },
  workspaces: {
    definitionsPath: '',
    buttonsPath: '',
    reloadDebounceMs: 250,
    launchWindowTimeoutMs: 8000,
  },
  matchWeights: {},
  disabledProviders: [],
  debugMode: false,
};

const MATCH_WEIGHT_KEYS: Array<keyof MatchWeights> = [
  'appUserModelId',
  'packageIdentity',
  'pwaIdentity',
  'processPath',
  'processName',
  'titleOnly',
  'titleBonus',
  'titleBonusThreshold',
];

let settingsCache: ToolbarSettings | null = null;

function getSettingsPath(): string {
  return path.join(getUserDataDir(), 'toolbar-settings.json');
}

function cloneSettings(settings: ToolbarSettings): ToolbarSettings {
  return {
    defaultActions: { ...settings.defaultActions },
    workspaces: { ...settings.workspaces },
    matchWeights: { ...settings.matchWeights },
    disabledProviders: [...settings.disabledProviders],
    debugMode: settings.debugMode,
  };
}

/**
 * Keeps durations inside a sane window; anything else reverts to the default.
 */
function normalizeDuration(value: unknown, fallback: number, max: number): number {
  const num = asFiniteNumber(value, fallback);
  if (num < 0 || num > max) return fallback;
  return Math.round(num);
}

/**
 * Accepts only known weight keys with non-negative integer values.
 */
function normalizeMatchWeights(value: unknown): Partial<MatchWeights> {
  if (!isRecord(value)) return {};
  const weights: Partial<MatchWeights> = {};
  for (const key of MATCH_WEIGHT_KEYS) {
    const raw = value[key];
    if (typeof raw !== 'number' || !Number.isFinite(raw) || raw < 0) continue;
    weights[key] = Math.round(raw);
  }
  return weights;
}

/**
 * Lower-cases and de-duplicates provider ids, since routing is case-insensitive.
 */
function normalizeProviderIds(value: unknown): string[] {
  const ids = asArray(value)
    .map((entry) => asTrimmedString(entry).toLowerCase())
    .filter(Boolean);
  return Array.from(new Set(ids));
}

/**
 * Builds normalized settings from untrusted parsed JSON input.
 */
function buildSettingsFromParsed(parsed: unknown): ToolbarSettings {
  if (!isRecord(parsed)) return cloneSettings(DEFAULT_SETTINGS);

  const defaults = DEFAULT_SETTINGS;
  const defaultActions = isRecord(parsed.defaultActions) ? parsed.defaultActions : {};
  const workspaces = isRecord(parsed.workspaces) ? parsed.workspaces : {};

  return {
    defaultActions: {
      systemControlsEnabled: asBoolean(
        defaultActions.systemControlsEnabled,
        defaults.defaultActions.systemControlsEnabled
      ),
      mediaPlayPauseEnabled: asBoolean(
        defaultActions.mediaPlayPauseEnabled,
        defaults.defaultActions.mediaPlayPauseEnabled
      ),
    },
    workspaces: {
      definitionsPath: asTrimmedString(workspaces.definitionsPath),
      buttonsPath: asTrimmedString(workspaces.buttonsPath),
      reloadDebounceMs: normalizeDuration(
        workspaces.reloadDebounceMs,
        defaults.workspaces.reloadDebounceMs,
        10_000
      ),
      launchWindowTimeoutMs: normalizeDuration(
        workspaces.launchWindowTimeoutMs,
        defaults.workspaces.launchWindowTimeoutMs,
        120_000
      ),
    },
    matchWeights: normalizeMatchWeights(parsed.matchWeights),
    disabledProviders: normalizeProviderIds(parsed.disabledProviders),
    debugMode: asBoolean(parsed.debugMode, defaults.debugMode),
  };
}

/**
 * Returns normalized settings with in-memory caching.
 */
export function loadSettings(): ToolbarSettings {
  if (settingsCache) return cloneSettings(settingsCache);

  try {
    const raw = fs.readFileSync(getSettingsPath(), 'utf-8');
    settingsCache = buildSettingsFromParsed(JSON.parse(raw));
  } catch {
    // Missing or malformed file: run on defaults.
    settingsCache = cloneSettings(DEFAULT_SETTINGS);
  }

  return cloneSettings(settingsCache);
}

/**
 * Persists a partial settings patch and updates in-memory cache.
 */
export function saveSettings(patch: Partial<ToolbarSettings>): ToolbarSettings {
  const current = loadSettings();
  const updated = buildSettingsFromParsed({
    ...current,
    ...patch,
    defaultActions: { ...current.defaultActions, ...patch.defaultActions },
    workspaces: { ...current.workspaces, ...patch.workspaces },
  });

  try {
    fs.mkdirSync(path.dirname(getSettingsPath()), { recursive: true });
    fs.writeFileSync(getSettingsPath(), JSON.stringify(updated, null, 2));
  } catch (e) {
    console.error('Failed to save settings:', e);
  }

  settingsCache = updated;
  return cloneSettings(updated);
}

/**
 * Resets cache so subsequent reads are reloaded from disk.
 */
export function resetSettingsCache(): void {
  settingsCache = null;
}
