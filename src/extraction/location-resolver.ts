/**
 * Location resolution against the gazetteer.
 * Both strategies return sorted matches, or ["Unknown"] when nothing matches.
 */

import { closest, distance } from 'fastest-levenshtein';
import { Gazetteer, normalizePlaceName } from '../gazetteer/gazetteer';
import { UNKNOWN_LOCATION, type LocationMatch } from '../types/feed';

export interface LocationResolver {
  resolve(candidates: Iterable<string>, gazetteer: Gazetteer): LocationMatch;
}

function toLocationMatch(matches: Set<string>): LocationMatch {
  return matches.size > 0 ? [...matches].sort() : [UNKNOWN_LOCATION];
}

export class ExactLocationResolver implements LocationResolver {
  resolve(candidates: Iterable<string>, gazetteer: Gazetteer): LocationMatch {
    const matches = new Set<string>();
    for (const candidate of candidates) {
      if (gazetteer.contains(candidate)) {
        matches.add(normalizePlaceName(candidate));
      }
    }
    return toLocationMatch(matches);
  }
}

/**
 * Similarity in [0, 1]: 1 - levenshtein / longer length.
 */
export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - distance(a, b) / longest;
}

/**
 * Tolerates small spelling differences ("odissa" -> "odisha").
 * Exact hits are taken as-is; every other candidate is compared with its
 * closest gazetteer entry and kept when the similarity reaches the threshold.
 */
export class FuzzyLocationResolver implements LocationResolver {
  private cachedEntries: { gazetteer: Gazetteer; entries: string[] } | null = null;

  constructor(readonly threshold = 0.85) {
    if (threshold <= 0 || threshold > 1) {
      throw new RangeError(`Fuzzy threshold must be in (0, 1], got ${threshold}`);
    }
  }

  private entriesOf(gazetteer: Gazetteer): string[] {
    if (!this.cachedEntries || this.cachedEntries.gazetteer !== gazetteer) {
      this.cachedEntries = { gazetteer, entries: gazetteer.entries() };
    }
    return this.cachedEntries.entries;
  }

  resolve(candidates: Iterable<string>, gazetteer: Gazetteer): LocationMatch {
    const matches = new Set<string>();
    const entries = this.entriesOf(gazetteer);

    for (const raw of candidates) {
      const candidate = normalizePlaceName(raw);
      if (!candidate) continue;

      if (gazetteer.contains(candidate)) {
        matches.add(candidate);
        continue;
      }
      if (entries.length === 0) continue;

      const nearest = closest(candidate, entries);
      if (similarity(candidate, nearest) >= this.threshold) {
        matches.add(nearest);
      }
    }
    return toLocationMatch(matches);
  }
}
