/**
 * Record assembly
 * Turns one feed entry into an OutputRecord, or null when the entry is skipped.
 */

import type { DisasterClassifier } from '../classification/disaster-classifier';
import { tryNormalizeFeedDate } from '../dates/feed-date';
import type { EntityExtractor } from '../extraction/entity-extractor';
import type { LocationResolver } from '../extraction/location-resolver';
import type { Gazetteer } from '../gazetteer/gazetteer';
import type { FeedEntry, OutputRecord } from '../types/feed';
import { DiagnosticLog } from './diagnostics';

export type TextField = 'title' | 'description' | 'link';

export interface AssemblyPolicy {
  /** Drop entries with no disaster keyword */
  relevantOnly: boolean;
  /** Fields whose absence skips the entry */
  requiredFields: readonly TextField[];
}

export const DEFAULT_ASSEMBLY_POLICY: AssemblyPolicy = {
  relevantOnly: true,
  requiredFields: ['title', 'description']
};

export interface AssemblerComponents {
  classifier: DisasterClassifier;
  extractor: EntityExtractor;
  resolver: LocationResolver;
}

export interface RecordAssemblerOptions extends AssemblerComponents {
  gazetteer: Gazetteer;
  policy?: Partial<AssemblyPolicy>;
  diagnostics?: DiagnosticLog;
}

const isPresent = (value: string | null | undefined): value is string =>
  value !== undefined && value !== null;

export class RecordAssembler {
  readonly policy: AssemblyPolicy;
  readonly diagnostics: DiagnosticLog;

  constructor(private readonly options: RecordAssemblerOptions) {
    this.policy = { ...DEFAULT_ASSEMBLY_POLICY, ...options.policy };
    this.diagnostics = options.diagnostics ?? new DiagnosticLog();
  }

  assemble(entry: FeedEntry): OutputRecord | null {
    const { classifier, extractor, resolver, gazetteer } = this.options;
    const context = { link: entry.link ?? undefined, source: entry.sourceUrl ?? undefined };

    const missing = this.policy.requiredFields.filter(field => !isPresent(entry[field]));
    if (missing.length > 0) {
      this.diagnostics.record('missing-field', `Skipping entry missing ${missing.join(', ')}`, {
        ...context,
        missing
      });
      return null;
    }

    const title = (entry.title ?? '').trim();
    const description = (entry.description ?? '').trim();
    const link = (entry.link ?? '').trim();
    const combinedText = `${title} ${description}`;

    const classification = classifier.classify(combinedText);
    if (this.policy.relevantOnly && !classification.isRelevant) {
      this.diagnostics.record('not-relevant', `Not disaster related: ${title}`, context);
      return null;
    }

    const rawDate = entry.publishedAt ?? '';
    const date = tryNormalizeFeedDate(rawDate);
    if (!date.ok) {
      this.diagnostics.record('unparseable-date', `Error parsing date ${rawDate}: ${date.reason}`, context);
    }

    const candidates = extractor.extractCandidates(combinedText, this.diagnostics);
    const locations = resolver.resolve(candidates, gazetteer);

    return {
      title,
      date: date.value,
      description,
      link,
      locations,
      source: entry.sourceUrl ?? '',
      disasterKeywords: classification.matchedKeywords
    };
  }
}
