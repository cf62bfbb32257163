/**
 * Environment configuration for the disaster feed pipeline
 * Loads and validates environment variables, filling in defaults
 */

import { z } from 'zod';
import { ConfigurationError } from '../pipeline/errors';
import type { OutputFormat } from '../output/writers';
import type { LogLevel } from '../utils/logger';

export const DEFAULT_FEED_URLS = [
  'https://www.thehindu.com/news/national/feeder/default.rss',
  'https://ddnews.gov.in/en/tag/rss/',
  'https://timesofindia.indiatimes.com/rssfeedstopstories.cms',
  'https://feeds.feedburner.com/ndtvnews-latest'
];

export type LocationStrategy = 'exact' | 'fuzzy';

export interface EnvironmentConfig {
  feeds: {
    urls: string[];
    concurrencyLimit: number;
    timeoutMs: number;
    retries: number;
    /** Read entries from this JSON file instead of fetching feeds */
    entriesFile?: string;
  };
  gazetteer: {
    referenceFile: string;
    columns: string[];
  };
  classifier: {
    vocabulary: string;
    relevantOnly: boolean;
  };
  extraction: {
    entityLabels: string[];
    locationStrategy: LocationStrategy;
    fuzzyThreshold: number;
    extraPlaces: string[];
  };
  output: {
    format: OutputFormat;
    csvFile: string;
    jsonFile: string;
    listDelimiter: string;
  };
  logging: {
    level: LogLevel;
  };
}

const csvList = (fallback: string[]) =>
  z.string().optional().transform(value => {
    if (value === undefined || value.trim() === '') return fallback;
    return value.split(',').map(item => item.trim()).filter(Boolean);
  });

const booleanFlag = (fallback: boolean) =>
  z.string().optional().transform((value, ctx) => {
    if (value === undefined) return fallback;
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(normalized)) return true;
    if (['false', '0', 'no'].includes(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${value}"` });
    return z.NEVER;
  });

const environmentSchema = z.object({
  FEED_URLS: csvList(DEFAULT_FEED_URLS).pipe(z.array(z.string().url()).min(1)),
  FEED_CONCURRENCY_LIMIT: z.coerce.number().int().positive().default(2),
  FEED_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  FEED_RETRIES: z.coerce.number().int().min(0).default(2),
  ENTRIES_FILE: z.string().min(1).optional(),
  REFERENCE_FILE: z.string().min(1).default('data/locations.csv'),
  GAZETTEER_COLUMNS: csvList(['name', 'subcountry', 'country']),
  DISASTER_VOCABULARY: z.string().min(1).default('extended'),
  RELEVANT_ONLY: booleanFlag(true),
  ENTITY_LABELS: csvList(['GPE']),
  LOCATION_STRATEGY: z.enum(['exact', 'fuzzy']).default('exact'),
  FUZZY_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.85),
  EXTRA_PLACES: csvList([]),
  OUTPUT_FORMAT: z.enum(['csv', 'json', 'both']).default('json'),
  OUTPUT_CSV_FILE: z.string().min(1).default('output/disaster_news.csv'),
  OUTPUT_JSON_FILE: z.string().min(1).default('output/disaster_news.json'),
  LIST_DELIMITER: z.string().min(1).default(', '),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

/**
 * Load and validate environment configuration
 * @throws ConfigurationError listing every invalid variable
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  // Empty strings count as unset so a blank line in .env keeps the default
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = environmentSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const vars = parsed.data;

  return {
    feeds: {
      urls: vars.FEED_URLS,
      concurrencyLimit: vars.FEED_CONCURRENCY_LIMIT,
      timeoutMs: vars.FEED_TIMEOUT_MS,
      retries: vars.FEED_RETRIES,
      entriesFile: vars.ENTRIES_FILE
    },
    gazetteer: {
      referenceFile: vars.REFERENCE_FILE,
      columns: vars.GAZETTEER_COLUMNS
    },
    classifier: {
      vocabulary: vars.DISASTER_VOCABULARY,
      relevantOnly: vars.RELEVANT_ONLY
    },
    extraction: {
      entityLabels: vars.ENTITY_LABELS,
      locationStrategy: vars.LOCATION_STRATEGY,
      fuzzyThreshold: vars.FUZZY_THRESHOLD,
      extraPlaces: vars.EXTRA_PLACES
    },
    output: {
      format: vars.OUTPUT_FORMAT,
      csvFile: vars.OUTPUT_CSV_FILE,
      jsonFile: vars.OUTPUT_JSON_FILE,
      listDelimiter: vars.LIST_DELIMITER
    },
    logging: {
      level: vars.LOG_LEVEL
    }
  };
}
