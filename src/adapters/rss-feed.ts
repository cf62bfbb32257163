/**
 * RSS/Atom feed adapter
 * Fetches feeds and reduces each item to a FeedEntry for the pipeline.
 */

import Parser from 'rss-parser';
import { load } from 'cheerio';
import pLimit from 'p-limit';
import pRetry from 'p-retry';
import type { FeedEntry } from '../types/feed';
import { DiagnosticLog } from '../pipeline/diagnostics';
import { FeedFetchError, errorMessage } from '../pipeline/errors';
import { logger } from '../utils/logger';

interface FeedItemFields {
  description?: unknown;
}

export interface FeedFetchOptions {
  timeoutMs?: number;
  retries?: number;
  minRetryDelayMs?: number;
}

export interface FeedFetchResult {
  url: string;
  success: boolean;
  entries: FeedEntry[];
  error?: string;
}

export type FeedFetcher = (url: string) => Promise<FeedEntry[]>;

function createParser(timeoutMs = 10000) {
  return new Parser<Record<string, unknown>, FeedItemFields>({
    timeout: timeoutMs,
    headers: {
      'User-Agent': 'Mozilla/5.0 (compatible; DisasterFeedPipeline/0.1)'
    },
    customFields: {
      item: ['description']
    }
  });
}

/**
 * Reduce feed markup to plain text: tags dropped, entities decoded,
 * whitespace collapsed.
 */
export function htmlToText(html: string): string {
  if (!/[<&]/.test(html)) {
    return html.replace(/\s+/g, ' ').trim();
  }
  return load(html).root().text().replace(/\s+/g, ' ').trim();
}

const textOrUndefined = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

type ParsedFeedItem = Parser.Item & FeedItemFields;

export function toFeedEntry(item: ParsedFeedItem, sourceUrl: string): FeedEntry {
  const rawDescription = textOrUndefined(item.description) ?? textOrUndefined(item.content);

  return {
    title: textOrUndefined(item.title),
    description: rawDescription === undefined ? undefined : htmlToText(rawDescription),
    link: textOrUndefined(item.link),
    publishedAt: textOrUndefined(item.pubDate),
    sourceUrl
  };
}

export async function parseFeedXml(xml: string, sourceUrl: string): Promise<FeedEntry[]> {
  const feed = await createParser().parseString(xml);
  return feed.items.map(item => toFeedEntry(item, sourceUrl));
}

export async function fetchFeedEntries(url: string, options: FeedFetchOptions = {}): Promise<FeedEntry[]> {
  const parser = createParser(options.timeoutMs);

  try {
    const feed = await pRetry(() => parser.parseURL(url), {
      retries: options.retries ?? 2,
      factor: 2,
      minTimeout: options.minRetryDelayMs ?? 1000,
      maxTimeout: 5000,
      onFailedAttempt: error => {
        logger.warn(`Fetch attempt ${error.attemptNumber} failed for ${url} (${error.retriesLeft} retries left)`, {
          error: error.message
        });
      }
    });

    logger.info(`Found ${feed.items.length} items in feed ${url}`);
    return feed.items.map(item => toFeedEntry(item, url));
  } catch (error) {
    throw new FeedFetchError(url, `Error fetching feed ${url}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Fetch several feeds with a concurrency limit. Results keep the order of
 * `urls`; a failing feed contributes no entries and a diagnostic.
 */
export async function fetchAllFeeds(
  urls: readonly string[],
  options: FeedFetchOptions & {
    concurrencyLimit?: number;
    diagnostics?: DiagnosticLog;
    fetchFeed?: FeedFetcher;
  } = {}
): Promise<FeedFetchResult[]> {
  const limit = pLimit(Math.max(1, options.concurrencyLimit ?? 2));
  const diagnostics = options.diagnostics ?? new DiagnosticLog();
  const fetchFeed: FeedFetcher = options.fetchFeed ?? (url => fetchFeedEntries(url, options));

  return Promise.all(
    urls.map(url =>
      limit(async (): Promise<FeedFetchResult> => {
        logger.info(`Scraping feed: ${url}`);
        try {
          const entries = await fetchFeed(url);
          return { url, success: true, entries };
        } catch (error) {
          const message = errorMessage(error);
          diagnostics.record('feed-unavailable', message, { url });
          return { url, success: false, entries: [], error: message };
        }
      })
    )
  );
}
