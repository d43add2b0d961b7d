import type { WindowMatcher } from './window-matcher';
import type { ApplicationDefinition, WindowInfo } from './types';

export interface ScoredMatch<T> {
  item: T;
  score: number;
}

/**
 * Highest-scoring window for `app` among those `isAvailable` accepts.
 * Ties go to the earlier window (z-order). Null when nothing scores above 0.
 */
export function findBestWindow<W extends WindowInfo>(
  windows: W[],
  app: ApplicationDefinition,
  matcher: WindowMatcher,
  isAvailable: (window: W) => boolean = () => true
): ScoredMatch<W> | null {
  let best: ScoredMatch<W> | null = null;
  for (const window of windows) {
    if (!isAvailable(window)) continue;
    const score = matcher.score(window, app);
    if (score > 0 && (!best || score > best.score)) best = { item: window, score };
  }
  return best;
}

/**
 * Highest-scoring definition for `window`, skipping definitions whose id is
 * in `claimed`.
 */
export function findBestDefinition(
  window: WindowInfo,
  apps: ApplicationDefinition[],
  matcher: WindowMatcher,
  claimed: ReadonlySet<string> = new Set()
): ScoredMatch<ApplicationDefinition> | null {
  let best: ScoredMatch<ApplicationDefinition> | null = null;
  for (const app of apps) {
    if (claimed.has(app.id)) continue;
    const score = matcher.score(window, app);
    if (score > 0 && (!best || score > best.score)) best = { item: app, score };
  }
  return best;
}
