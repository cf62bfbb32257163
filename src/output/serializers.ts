/**
 * Output shapes for downstream consumers
 * - flat: one CSV row per record, list fields joined with a delimiter
 * - nested: JSON envelope with run metadata and native arrays
 */

import { stringify } from 'csv-stringify/sync';
import type { OutputRecord } from '../types/feed';

export const DEFAULT_LIST_DELIMITER = ', ';

export interface FlatRow {
  title: string;
  date: string;
  description: string;
  link: string;
  locations: string;
  source: string;
  disasterKeywords: string;
}

const CSV_COLUMNS: { key: keyof FlatRow; header: string }[] = [
  { key: 'title', header: 'Title' },
  { key: 'date', header: 'Date' },
  { key: 'description', header: 'Description' },
  { key: 'link', header: 'Link' },
  { key: 'locations', header: 'Locations' },
  { key: 'source', header: 'Source' },
  { key: 'disasterKeywords', header: 'Disaster Keywords' }
];

export function toFlatRow(record: OutputRecord, delimiter = DEFAULT_LIST_DELIMITER): FlatRow {
  return {
    title: record.title,
    date: record.date,
    description: record.description,
    link: record.link,
    locations: record.locations.join(delimiter),
    source: record.source,
    disasterKeywords: record.disasterKeywords.join(delimiter)
  };
}

export function toFlatRows(records: readonly OutputRecord[], delimiter = DEFAULT_LIST_DELIMITER): FlatRow[] {
  return records.map(record => toFlatRow(record, delimiter));
}

export function toCsv(records: readonly OutputRecord[], delimiter = DEFAULT_LIST_DELIMITER): string {
  return stringify(toFlatRows(records, delimiter), {
    header: true,
    columns: CSV_COLUMNS
  });
}

// Nested shape keeps the snake_case keys existing consumers read
export interface ArticleJson {
  title: string;
  date: string;
  description: string;
  link: string;
  locations: string[];
  source: string;
  disaster_keywords: string[];
}

export interface EnvelopeMetadata {
  timestamp: string;
  feeds: string[];
  total_locations: number;
  total_disaster_articles?: number;
  total_articles?: number;
}

export interface OutputEnvelope {
  metadata: EnvelopeMetadata;
  disaster_articles?: ArticleJson[];
  articles?: ArticleJson[];
}

export interface RunMetadata {
  runAt: Date;
  feeds: readonly string[];
  gazetteerSize: number;
  /** Names the collection `disaster_articles` rather than `articles` */
  relevantOnly: boolean;
}

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Local wall-clock "YYYY-MM-DD HH:MM:SS"
 */
export function formatRunTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function toArticleJson(record: OutputRecord): ArticleJson {
  return {
    title: record.title,
    date: record.date,
    description: record.description,
    link: record.link,
    locations: [...record.locations],
    source: record.source,
    disaster_keywords: [...record.disasterKeywords]
  };
}

export function buildEnvelope(records: readonly OutputRecord[], metadata: RunMetadata): OutputEnvelope {
  const articles = records.map(toArticleJson);
  const base: EnvelopeMetadata = {
    timestamp: formatRunTimestamp(metadata.runAt),
    feeds: [...metadata.feeds],
    total_locations: metadata.gazetteerSize
  };

  if (metadata.relevantOnly) {
    return {
      metadata: { ...base, total_disaster_articles: articles.length },
      disaster_articles: articles
    };
  }
  return {
    metadata: { ...base, total_articles: articles.length },
    articles
  };
}
