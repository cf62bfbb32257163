import type { ClassificationResult } from '../types/feed';

/**
 * Keyword relevance classifier.
 *
 * Matching is plain case-insensitive substring containment with no word
 * boundaries: "storm" matches inside "rainstorm" and "alert" inside
 * "alerted". Matched keywords come back in vocabulary order.
 */
export class DisasterClassifier {
  readonly vocabulary: readonly string[];

  constructor(vocabulary: Iterable<string>) {
    const normalized = new Set<string>();
    for (const keyword of vocabulary) {
      const lower = keyword.trim().toLowerCase();
      if (lower) normalized.add(lower);
    }
    this.vocabulary = Object.freeze([...normalized]);
  }

  classify(text: string): ClassificationResult {
    const haystack = text.toLowerCase();
    const matchedKeywords = this.vocabulary.filter(keyword => haystack.includes(keyword));

    return {
      isRelevant: matchedKeywords.length > 0,
      matchedKeywords
    };
  }
}
