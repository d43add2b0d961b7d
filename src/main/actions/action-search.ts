import type { ActionDescriptor } from './types';

const WORD_BOUNDARY = /[\s\-_/&.,()]/;
const WORD_SPLIT = /[\s\-_/&.,()]+/;

/**
 * Score a single query word against a target string.
 * Returns 0 if the word does not match at all.
 *
 * Tiers (highest wins):
 *   1000 exact
 *    700 target starts with query
 *    500 query appears at a word boundary in target  ("space" in "Work Space")
 *    400 query appears anywhere in target            ("pace" in "Work Space")
 *    350 acronym exact              ("ws" matches "Work Space")
 *    300 acronym prefix             ("w" against initials "WS")
 *    250 acronym contains
 *   1–149 fuzzy subsequence: all chars of query appear in order, consecutive/word-start bonuses
 */
export function scoreWord(query: string, target: string): number {
  const q = query.toLowerCase();
  const t = target.toLowerCase();
  if (!q || !t) return 0;

  if (t === q) return 1000;
  if (t.startsWith(q)) return 700;

  const idx = t.indexOf(q);
  if (idx >= 0) {
    const atBoundary = idx === 0 || WORD_BOUNDARY.test(t[idx - 1]);
    return atBoundary ? 500 : 400;
  }

  const initials = t
    .split(WORD_SPLIT)
    .filter(Boolean)
    .map((w) => w[0] ?? '')
    .join('');

  if (initials === q) return 350;
  if (initials.startsWith(q)) return 300;
  if (initials.includes(q)) return 250;

  let qi = 0;
  let lastIdx = -1;
  let fuzzyScore = 0;
  for (let ti = 0; ti < t.length && qi < q.length; ti++) {
    if (t[ti] === q[qi]) {
      const isConsecutive = lastIdx === ti - 1;
      const isWordStart = ti === 0 || WORD_BOUNDARY.test(t[ti - 1]);
      fuzzyScore += isWordStart ? 20 : isConsecutive ? 12 : 5;
      lastIdx = ti;
      qi++;
    }
  }
  if (qi === q.length) return Math.min(fuzzyScore, 149);

  return 0;
}

function bestFieldScore(word: string, action: ActionDescriptor, includeSubtitle: boolean): number {
  const titleScore = scoreWord(word, action.title);
  const keywordScore = action.keywords.reduce((best, k) => Math.max(best, scoreWord(word, k) * 0.85), 0);
  const subtitleScore = includeSubtitle ? scoreWord(word, action.subtitle) * 0.5 : 0;
  return Math.max(titleScore, keywordScore, subtitleScore);
}

/**
 * Ranks discovered actions against a free-text query. An empty query keeps
 * the input order. With several words, every word must match the title or a
 * keyword and the score is their average.
 */
export function searchActions(actions: ActionDescriptor[], query: string): ActionDescriptor[] {
  if (!query.trim()) return actions;

  const words = query.toLowerCase().trim().split(/\s+/).filter(Boolean);

  return actions
    .map((action, index) => {
      let score = 0;
      if (words.length === 1) {
        score = bestFieldScore(words[0], action, true);
      } else {
        let total = 0;
        let allMatch = true;
        for (const word of words) {
          const best = bestFieldScore(word, action, false);
          if (best === 0) {
            allMatch = false;
            break;
          }
          total += best;
        }
        if (allMatch) score = total / words.length;
      }
      return { action, score, index };
    })
    .filter(({ score }) => score > 0)
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map(({ action }) => action);
}
