// Record shapes shared by the extraction pipeline

export const UNKNOWN_LOCATION = 'Unknown';

/**
 * One item from a syndication feed, as handed over by the feed adapter.
 * Every field may be missing; the assembler decides what it can work with.
 */
export interface FeedEntry {
  title?: string | null;
  description?: string | null;
  link?: string | null;
  publishedAt?: string | null;  // Raw feed date, e.g. "Tue, 10 Oct 2023 08:00:00 +0000"
  sourceUrl?: string | null;    // Feed the item came from
}

export interface ClassificationResult {
  isRelevant: boolean;
  matchedKeywords: string[];    // Vocabulary order, no duplicates
}

/**
 * Gazetteer matches for one item. Never empty: no match is `["Unknown"]`.
 */
export type LocationMatch = string[];

export interface OutputRecord {
  title: string;
  date: string;                 // "YYYY-MM-DD HH:MM:SS", or the raw value when unparseable
  description: string;
  link: string;
  locations: LocationMatch;
  source: string;
  disasterKeywords: string[];
}
