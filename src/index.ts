export * from './types/feed';
export { Gazetteer, normalizePlaceName, type ReferenceRow } from './gazetteer/gazetteer';
export { loadGazetteer, gazetteerFromCsv, parseReferenceCsv } from './gazetteer/reference-loader';
export {
  normalizeFeedDate,
  tryNormalizeFeedDate,
  parseFeedDate,
  formatFeedDate,
  type ParsedFeedDate,
  type NormalizedDateResult
} from './dates/feed-date';
export { DisasterClassifier } from './classification/disaster-classifier';
export { getVocabulary, vocabularyNames } from './config/vocabulary';
export {
  NamedEntityExtractor,
  GPE_LABEL,
  type EntityExtractor,
  type EntityModel,
  type TaggedEntity
} from './extraction/entity-extractor';
export { CompromiseEntityModel, cleanPlaceSpan } from './extraction/compromise-model';
export {
  ExactLocationResolver,
  FuzzyLocationResolver,
  similarity,
  type LocationResolver
} from './extraction/location-resolver';
export { RecordAssembler, DEFAULT_ASSEMBLY_POLICY, type AssemblyPolicy } from './pipeline/record-assembler';
export { PipelineDriver, type PipelineRunResult, type PipelineStats } from './pipeline/pipeline-driver';
export { DiagnosticLog, type Diagnostic, type DiagnosticKind } from './pipeline/diagnostics';
export * from './pipeline/errors';
export { runDisasterScan, createPipelineComponents, type ScanResult } from './pipeline/disaster-scan';
export { fetchAllFeeds, fetchFeedEntries, parseFeedXml } from './adapters/rss-feed';
export { loadEntriesFile, readFeedEntries } from './adapters/entries-file';
export { toCsv, toFlatRows, buildEnvelope, formatRunTimestamp, type OutputEnvelope } from './output/serializers';
export { writeOutputs, type OutputFormat } from './output/writers';
export { loadEnvironmentConfig, type EnvironmentConfig } from './config/environment';
export { logger } from './utils/logger';
