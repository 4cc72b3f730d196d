/**
 * ValueResolver: fuzzy lookup of a field name in the caller's KnownData.
 *
 * Both sides are normalized (lowercase, letters and digits only) and scored
 * with a partial Levenshtein ratio, so "Email Address" finds `email` and
 * "First Name" finds `first_name`. The best key wins when its score reaches
 * the threshold.
 */

import { DEFAULT_FUZZY_MATCH_THRESHOLD } from '../config/constants.js';
import { findBestMatch } from './similarity.js';
import type { KnownData, KnownValue, ResolvedValue } from './types.js';

/** KnownData key holding a path to upload into file inputs. */
export const RESUME_PATH_KEY = 'resume_path';

export type MatchResult =
  | { matched: true; key: string; value: string; score: number }
  | { matched: false; bestKey?: string; bestScore?: number };

interface Entry {
  key: string;
  value: string;
}

function stringify(value: KnownValue | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  return typeof value === 'string' ? value : String(value);
}

/** Entries eligible for fuzzy matching; `resume_path` only ever feeds file inputs. */
function usableEntries(knownData: KnownData): Entry[] {
  const entries: Entry[] = [];
  for (const [key, raw] of Object.entries(knownData)) {
    if (key === RESUME_PATH_KEY) continue;
    const value = stringify(raw);
    if (value !== undefined) entries.push({ key, value });
  }
  return entries;
}

const RESUME_FIELD = /resume|\bcv\b|\bfiles?\b/i;

/** Whether a file input's name suggests it takes the resume. */
export function isResumeField(fieldName: string): boolean {
  return RESUME_FIELD.test(fieldName.replace(/[_-]+/g, ' '));
}

export class ValueResolver {
  constructor(readonly threshold: number = DEFAULT_FUZZY_MATCH_THRESHOLD) {}

  resolve(fieldName: string, knownData: KnownData): MatchResult {
    const best = findBestMatch(fieldName, usableEntries(knownData), (entry) => entry.key);
    if (!best) return { matched: false };
    if (best.score < this.threshold) {
      return { matched: false, bestKey: best.item.key, bestScore: best.score };
    }
    return { matched: true, key: best.item.key, value: best.item.value, score: best.score };
  }

  /**
   * Path for a file input. Resume-like fields ("resume", "cv", "file") take
   * an explicit `resume_path` entry first; any field then tries a fuzzy key
   * match; resume-like fields finally fall back to the configured resume.
   */
  resolveFile(fieldName: string, knownData: KnownData, fallbackPath?: string): ResolvedValue | undefined {
    const resumeField = isResumeField(fieldName);
    const explicit = stringify(knownData[RESUME_PATH_KEY]);
    if (resumeField && explicit) return { value: explicit, provenance: 'matched', key: RESUME_PATH_KEY, score: 100 };

    const match = this.resolve(fieldName, knownData);
    if (match.matched) return { value: match.value, provenance: 'matched', key: match.key, score: match.score };

    return resumeField && fallbackPath ? { value: fallbackPath, provenance: 'default' } : undefined;
  }
}
