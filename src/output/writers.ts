import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { OutputRecord } from '../types/feed';
import { logger } from '../utils/logger';
import { toCsv, type OutputEnvelope } from './serializers';

export type OutputFormat = 'csv' | 'json' | 'both';

export interface OutputOptions {
  format: OutputFormat;
  csvFile: string;
  jsonFile: string;
  listDelimiter: string;
  envelope: OutputEnvelope;
}

async function writeText(filePath: string, contents: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, contents, 'utf-8');
}

/**
 * Write the configured output shapes. Returns the paths written.
 */
export async function writeOutputs(records: readonly OutputRecord[], options: OutputOptions): Promise<string[]> {
  const written: string[] = [];

  if (options.format === 'csv' || options.format === 'both') {
    await writeText(options.csvFile, toCsv(records, options.listDelimiter));
    written.push(options.csvFile);
  }

  if (options.format === 'json' || options.format === 'both') {
    await writeText(options.jsonFile, JSON.stringify(options.envelope, null, 2));
    written.push(options.jsonFile);
  }

  logger.info(`Successfully saved ${records.length} entries`, { files: written });
  return written;
}
