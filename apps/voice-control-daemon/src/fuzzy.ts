import { distance } from 'fastest-levenshtein';

/** Levenshtein similarity, 0–100 */
export function ratio(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 100;
  return Math.round(100 * (1 - distance(a, b) / longest));
}

/** Best similarity of the shorter string against every same-length window of the longer */
export function partialRatio(a: string, b: string): number {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (shorter.length === 0) return longer.length === 0 ? 100 : 0;

  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start += 1) {
    best = Math.max(best, ratio(shorter, longer.slice(start, start + shorter.length)));
    if (best === 100) break;
  }
  return best;
}

function sortedTokens(text: string): string {
  return text.split(/\s+/).filter(Boolean).sort().join(' ');
}

/** Word-order-insensitive similarity */
export function tokenSortRatio(a: string, b: string): number {
  return ratio(sortedTokens(a), sortedTokens(b));
}

/**
 * Weighted similarity of a spoken phrase against a known phrase, 0–100.
 * Substring matches count only when the lengths differ enough, and are
 * discounted heavily for very short candidates.
 */
export function similarity(query: string, candidate: string): number {
  const a = query.trim().toLowerCase();
  const b = candidate.trim().toLowerCase();
  if (a.length === 0 || b.length === 0) return 0;

  let best = Math.max(ratio(a, b), Math.round(0.95 * tokenSortRatio(a, b)));

  const lengthRatio = Math.max(a.length, b.length) / Math.min(a.length, b.length);
  if (lengthRatio >= 1.5) {
    const scale = lengthRatio > 8 ? 0.6 : 0.9;
    best = Math.max(best, Math.round(partialRatio(a, b) * scale));
  }
  return best;
}
