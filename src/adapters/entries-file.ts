/**
 * Offline input: a JSON array of feed entries saved by an earlier fetch.
 * Items that do not look like feed entries are dropped with a diagnostic.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { FeedEntry } from '../types/feed';
import { DiagnosticLog } from '../pipeline/diagnostics';
import { errorMessage } from '../pipeline/errors';

export const feedEntrySchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  link: z.string().nullish(),
  publishedAt: z.string().nullish(),
  sourceUrl: z.string().nullish()
});

export function readFeedEntries(input: unknown, diagnostics: DiagnosticLog, source = 'entries'): FeedEntry[] {
  if (!Array.isArray(input)) {
    diagnostics.record('feed-unavailable', `Expected an array of feed entries in ${source}`, { source });
    return [];
  }

  const entries: FeedEntry[] = [];
  input.forEach((item: unknown, index) => {
    const result = feedEntrySchema.safeParse(item);
    if (result.success) {
      entries.push(result.data);
    } else {
      diagnostics.record('entry-failed', `Invalid feed entry ${index} in ${source}: ${result.error.issues[0]?.message}`, {
        source,
        index
      });
    }
  });
  return entries;
}

export async function loadEntriesFile(filePath: string, diagnostics: DiagnosticLog): Promise<FeedEntry[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (error) {
    diagnostics.record('feed-unavailable', `Entries file could not be read: ${errorMessage(error)}`, {
      source: filePath
    });
    return [];
  }
  return readFeedEntries(parsed, diagnostics, filePath);
}
