/**
 * Window identity matching.
 *
 * Scores how confidently a live window belongs to a saved application
 * definition. The score is the strongest identity signal that fired, plus a
 * small title bonus for already-strong matches:
 *
 *   AppUserModelId        1000
 *   package identity       900
 *   PWA identity           850
 *   process path/file      750
 *   process name           650
 *   title (title-only)     400   or +20 on top of a score >= 650
 *
 * Path and name signals never fire for the UWP frame host, which hosts many
 * unrelated apps under one executable.
 */

import * as path from 'path';
import { equalsIgnoreCase, hasText } from '../json-values';
import type { ApplicationDefinition, WindowInfo } from './types';

export interface MatchWeights {
  appUserModelId: number;
  packageIdentity: number;
  pwaIdentity: number;
  processPath: number;
  processName: number;
  titleOnly: number;
  titleBonus: number;
  /** Minimum score a title bonus may be stacked on. */
  titleBonusThreshold: number;
}

export const DEFAULT_MATCH_WEIGHTS: Readonly<MatchWeights> = Object.freeze({
  appUserModelId: 1000,
  packageIdentity: 900,
  pwaIdentity: 850,
  processPath: 750,
  processName: 650,
  titleOnly: 400,
  titleBonus: 20,
  titleBonusThreshold: 650,
});

export const FRAME_HOST_EXECUTABLE = 'ApplicationFrameHost.exe';

const BROWSER_PROCESSES = ['msedge', 'chrome'];

export interface WindowMatcher {
  readonly weights: Readonly<MatchWeights>;
  score(window: WindowInfo, app: ApplicationDefinition): number;
  isMatch(window: WindowInfo, app: ApplicationDefinition): boolean;
  isTitleOnlyMatch(window: WindowInfo, app: ApplicationDefinition): boolean;
}

// ─── Normalization ──────────────────────────────────────────────────

function expandEnvironmentVariables(value: string): string {
  return value.replace(/%([^%]+)%/g, (whole, name: string) => {
    const resolved = process.env[name];
    return resolved === undefined ? whole : resolved;
  });
}

function trimQuotes(value: string): string {
  return value.trim().replace(/^"+|"+$/g, '');
}

/** Last path segment, accepting both separator styles. */
function fileNameOf(value: string): string {
  return path.win32.basename(value);
}

/**
 * Expands `%VAR%` references and canonicalizes separators and `..` segments.
 * `shell:` monikers and relative paths pass through untouched.
 */
export function normalizeAppPath(value: string): string {
  if (!hasText(value)) return '';
  const expanded = trimQuotes(expandEnvironmentVariables(value));
  if (expanded.toLowerCase().startsWith('shell:')) return expanded;
  if (/^[a-zA-Z]:[\\/]/.test(expanded) || expanded.startsWith('\\\\')) {
    return path.win32.normalize(expanded);
  }
  if (expanded.startsWith('/')) return path.posix.normalize(expanded);
  return expanded;
}

export function normalizeFileName(value: string): string {
  if (!hasText(value)) return '';
  return fileNameOf(trimQuotes(expandEnvironmentVariables(value)));
}

/** Trims and drops a trailing `.exe`. */
export function normalizeProcessName(value: string): string {
  if (!hasText(value)) return '';
  const trimmed = value.trim();
  return trimmed.toLowerCase().endsWith('.exe') ? trimmed.slice(0, -4) : trimmed;
}

export function isFrameHostPath(value: string): boolean {
  if (!hasText(value)) return false;
  return equalsIgnoreCase(normalizeFileName(value), FRAME_HOST_EXECUTABLE);
}

/**
 * `Name_Version_Arch_Resource_Publisher` → `Name_Publisher`. Empty when the
 * value does not look like a package full name.
 */
export function getPackageFamilyName(packageFullName: string): string {
  if (!hasText(packageFullName)) return '';
  const parts = packageFullName.split('_');
  if (parts.length < 2) return '';
  const name = parts[0];
  const publisher = parts[parts.length - 1];
  if (!hasText(name) || !hasText(publisher)) return '';
  return `${name}_${publisher}`;
}

// ─── Signals ────────────────────────────────────────────────────────

function matchesAppUserModelId(window: WindowInfo, app: ApplicationDefinition): boolean {
  return (
    hasText(app.appUserModelId) &&
    hasText(window.appUserModelId) &&
    equalsIgnoreCase(window.appUserModelId, app.appUserModelId)
  );
}

function matchesPackageIdentity(window: WindowInfo, app: ApplicationDefinition): boolean {
  if (!hasText(app.packageFullName)) return false;
  if (hasText(window.packageFullName) && equalsIgnoreCase(window.packageFullName, app.packageFullName)) {
    return true;
  }
  const appFamily = getPackageFamilyName(app.packageFullName);
  if (!appFamily) return false;
  const windowFamily = getPackageFamilyName(window.packageFullName);
  return Boolean(windowFamily) && equalsIgnoreCase(windowFamily, appFamily);
}

function isBrowserWindow(window: WindowInfo): boolean {
  const name = normalizeProcessName(window.processName) || normalizeProcessName(window.processFileName);
  return BROWSER_PROCESSES.includes(name.toLowerCase());
}

function matchesPwaIdentity(window: WindowInfo, app: ApplicationDefinition): boolean {
  if (!hasText(app.pwaAppId) || !isBrowserWindow(window)) return false;
  return (
    hasText(window.appUserModelId) &&
    window.appUserModelId.toLowerCase().includes(app.pwaAppId.toLowerCase())
  );
}

function matchesProcessPath(window: WindowInfo, app: ApplicationDefinition): boolean {
  const appPath = normalizeAppPath(app.path);
  if (!appPath || !hasText(window.processPath)) return false;
  if (equalsIgnoreCase(window.processPath, appPath)) return true;

  const appFileName = normalizeFileName(app.path);
  return (
    Boolean(appFileName) &&
    hasText(window.processFileName) &&
    equalsIgnoreCase(window.processFileName, appFileName)
  );
}

function matchesProcessName(window: WindowInfo, app: ApplicationDefinition): boolean {
  return (
    hasText(app.name) &&
    hasText(window.processName) &&
    equalsIgnoreCase(normalizeProcessName(window.processName), normalizeProcessName(app.name))
  );
}

function matchesTitle(window: WindowInfo, app: ApplicationDefinition): boolean {
  return hasText(app.title) && hasText(window.title) && equalsIgnoreCase(window.title, app.title);
}

/**
 * Whether a definition may be matched on title alone: it carries no strong
 * identity and no path or name the process signals could use.
 */
export function shouldAllowTitleMatch(app: ApplicationDefinition): boolean {
  if (hasText(app.appUserModelId) || hasText(app.packageFullName) || hasText(app.pwaAppId)) {
    return false;
  }
  if (isFrameHostPath(app.path) || isFrameHostPath(app.name)) return true;
  return !hasText(app.path) && !hasText(app.name);
}

function matchesProcessIdentity(window: WindowInfo, app: ApplicationDefinition): boolean {
  if (isFrameHostPath(app.path)) return false;
  return matchesProcessPath(window, app) || matchesProcessName(window, app);
}

// ─── Matcher ────────────────────────────────────────────────────────

export function createWindowMatcher(overrides: Partial<MatchWeights> = {}): WindowMatcher {
  const weights: Readonly<MatchWeights> = Object.freeze({ ...DEFAULT_MATCH_WEIGHTS, ...overrides });

  const score = (window: WindowInfo, app: ApplicationDefinition): number => {
    let result = 0;

    if (matchesAppUserModelId(window, app)) result = Math.max(result, weights.appUserModelId);
    if (matchesPackageIdentity(window, app)) result = Math.max(result, weights.packageIdentity);
    if (matchesPwaIdentity(window, app)) result = Math.max(result, weights.pwaIdentity);

    if (!isFrameHostPath(app.path)) {
      if (matchesProcessPath(window, app)) result = Math.max(result, weights.processPath);
      if (matchesProcessName(window, app)) result = Math.max(result, weights.processName);
    }

    if (matchesTitle(window, app)) {
      if (shouldAllowTitleMatch(app)) {
        result = Math.max(result, weights.titleOnly);
      } else if (result >= weights.titleBonusThreshold) {
        result += weights.titleBonus;
      }
    }

    return result;
  };

  const isTitleOnlyMatch = (window: WindowInfo, app: ApplicationDefinition): boolean => {
    if (!matchesTitle(window, app) || !shouldAllowTitleMatch(app)) return false;
    if (
      matchesAppUserModelId(window, app) ||
      matchesPackageIdentity(window, app) ||
      matchesPwaIdentity(window, app)
    ) {
      return false;
    }
    return !matchesProcessIdentity(window, app);
  };

  return {
    weights,
    score,
    isMatch: (window, app) => score(window, app) > 0,
    isTitleOnlyMatch,
  };
}

const defaultMatcher = createWindowMatcher();

export function getMatchScore(window: WindowInfo, app: ApplicationDefinition): number {
  return defaultMatcher.score(window, app);
}

export function isMatch(window: WindowInfo, app: ApplicationDefinition): boolean {
  return defaultMatcher.isMatch(window, app);
}

export function isTitleOnlyMatch(window: WindowInfo, app: ApplicationDefinition): boolean {
  return defaultMatcher.isTitleOnlyMatch(window, app);
}
