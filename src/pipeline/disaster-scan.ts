/**
 * Disaster scan workflow:
 * 1. Loads the gazetteer from reference data
 * 2. Fetches entries from every configured feed (or a saved entries file)
 * 3. Runs the extraction pipeline over the entries in feed order
 * 4. Builds the output envelope with run metadata
 *
 * Writing the outputs is left to the caller.
 */

import { fetchAllFeeds, type FeedFetchResult, type FeedFetcher } from '../adapters/rss-feed';
import { loadEntriesFile } from '../adapters/entries-file';
import { DisasterClassifier } from '../classification/disaster-classifier';
import type { EnvironmentConfig } from '../config/environment';
import { getVocabulary } from '../config/vocabulary';
import { CompromiseEntityModel } from '../extraction/compromise-model';
import { NamedEntityExtractor, type EntityModel } from '../extraction/entity-extractor';
import {
  ExactLocationResolver,
  FuzzyLocationResolver,
  type LocationResolver
} from '../extraction/location-resolver';
import { loadGazetteer } from '../gazetteer/reference-loader';
import { buildEnvelope, type OutputEnvelope } from '../output/serializers';
import type { FeedEntry, OutputRecord } from '../types/feed';
import { logger } from '../utils/logger';
import { DiagnosticLog, type Diagnostic } from './diagnostics';
import { PipelineDriver, type PipelineStats } from './pipeline-driver';
import type { AssemblerComponents } from './record-assembler';

export interface ScanDependencies {
  fetchFeed?: FeedFetcher;
  entityModel?: EntityModel;
  now?: () => Date;
  signal?: AbortSignal;
}

export interface ScanResult {
  records: OutputRecord[];
  envelope: OutputEnvelope;
  diagnostics: Diagnostic[];
  stats: PipelineStats;
  feeds: FeedFetchResult[];
  gazetteerSize: number;
}

export function createLocationResolver(config: EnvironmentConfig['extraction']): LocationResolver {
  return config.locationStrategy === 'fuzzy'
    ? new FuzzyLocationResolver(config.fuzzyThreshold)
    : new ExactLocationResolver();
}

/**
 * Build the pipeline components from configuration.
 * @throws ConfigurationError for an unknown vocabulary
 */
export function createPipelineComponents(
  config: EnvironmentConfig,
  entityModel?: EntityModel
): AssemblerComponents {
  const model = entityModel ?? new CompromiseEntityModel({ places: config.extraction.extraPlaces });

  return {
    classifier: new DisasterClassifier(getVocabulary(config.classifier.vocabulary)),
    extractor: new NamedEntityExtractor(model, { labels: config.extraction.entityLabels }),
    resolver: createLocationResolver(config.extraction)
  };
}

async function collectEntries(
  config: EnvironmentConfig,
  diagnostics: DiagnosticLog,
  fetchFeed?: FeedFetcher
): Promise<{ entries: FeedEntry[]; feeds: FeedFetchResult[] }> {
  if (config.feeds.entriesFile) {
    const entries = await loadEntriesFile(config.feeds.entriesFile, diagnostics);
    return { entries, feeds: [] };
  }

  const feeds = await fetchAllFeeds(config.feeds.urls, {
    concurrencyLimit: config.feeds.concurrencyLimit,
    timeoutMs: config.feeds.timeoutMs,
    retries: config.feeds.retries,
    diagnostics,
    fetchFeed
  });
  return { entries: feeds.flatMap(feed => feed.entries), feeds };
}

export async function runDisasterScan(
  config: EnvironmentConfig,
  dependencies: ScanDependencies = {}
): Promise<ScanResult> {
  const diagnostics = new DiagnosticLog();
  const now = dependencies.now ?? (() => new Date());

  // Components first: a bad vocabulary should fail before any network work
  const components = createPipelineComponents(config, dependencies.entityModel);

  const gazetteer = await loadGazetteer(config.gazetteer.referenceFile, config.gazetteer.columns, diagnostics);
  const { entries, feeds } = await collectEntries(config, diagnostics, dependencies.fetchFeed);
  logger.info(`Collected ${entries.length} entries from ${feeds.length || 1} source(s)`);

  const driver = new PipelineDriver(components, { relevantOnly: config.classifier.relevantOnly });
  const result = driver.run(entries, gazetteer, { signal: dependencies.signal, diagnostics });

  const envelope = buildEnvelope(result.records, {
    runAt: now(),
    feeds: config.feeds.entriesFile ? [config.feeds.entriesFile] : config.feeds.urls,
    gazetteerSize: gazetteer.size,
    relevantOnly: config.classifier.relevantOnly
  });

  return {
    records: result.records,
    envelope,
    diagnostics: result.diagnostics,
    stats: result.stats,
    feeds,
    gazetteerSize: gazetteer.size
  };
}
