import { distance } from 'fastest-levenshtein';

/** Shorter strings than this are compared whole, never as a substring. */
const MIN_PARTIAL_LENGTH = 3;

/** Lowercase and keep letters and digits only: "First Name" -> "firstname". */
export function normalizeForMatch(value: string): string {
  return value.toLowerCase().replace(/[^\p{L}\p{N}]/gu, '');
}

/** Levenshtein similarity, 0-100. Two empty strings are identical. */
export function ratio(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 100;
  return Math.round((1 - distance(a, b) / longest) * 100);
}

/**
 * Best `ratio` of the shorter string against every same-length window of
 * the longer one. "email" scores 100 against "emailaddress".
 */
export function partialRatio(a: string, b: string): number {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (shorter.length === 0) return longer.length === 0 ? 100 : 0;

  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start++) {
    const score = ratio(shorter, longer.slice(start, start + shorter.length));
    if (score > best) best = score;
    if (best === 100) break;
  }
  return best;
}

/** Score two already-normalized strings. */
export function matchScore(a: string, b: string): number {
  return Math.min(a.length, b.length) < MIN_PARTIAL_LENGTH ? ratio(a, b) : partialRatio(a, b);
}

export interface BestMatch<T> {
  item: T;
  score: number;
}

/** Highest `matchScore` of `query` among `candidates`; ties go to the earlier candidate. */
export function findBestMatch<T>(
  query: string,
  candidates: readonly T[],
  text: (item: T) => string,
): BestMatch<T> | undefined {
  const target = normalizeForMatch(query);
  if (!target) return undefined;

  let best: BestMatch<T> | undefined;
  for (const item of candidates) {
    const candidate = normalizeForMatch(text(item));
    if (!candidate) continue;
    const score = matchScore(target, candidate);
    if (!best || score > best.score) best = { item, score };
  }
  return best;
}
