/**
 * Reference data loading
 * Reads a place-name CSV (header row required) into a Gazetteer.
 * An unreadable or empty file yields an empty gazetteer and a diagnostic.
 */

import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { Gazetteer } from './gazetteer';
import { DiagnosticLog } from '../pipeline/diagnostics';
import { ReferenceDataError, errorMessage } from '../pipeline/errors';
import { logger } from '../utils/logger';

const referenceRowsSchema = z.array(z.record(z.string()));

export type ReferenceRows = z.infer<typeof referenceRowsSchema>;

export interface ReferenceTable {
  /** Header row as written; rows may lack trailing columns */
  header: string[];
  rows: ReferenceRows;
}

export function parseReferenceCsv(csv: string): ReferenceTable {
  let header: string[] = [];
  let parsed: unknown;
  try {
    parsed = parse(csv, {
      columns: (names: string[]) => {
        header = names;
        return names;
      },
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true
    });
  } catch (error) {
    throw new ReferenceDataError(`Malformed reference CSV: ${errorMessage(error)}`, { cause: error });
  }

  const result = referenceRowsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ReferenceDataError(`Unexpected reference row shape: ${result.error.message}`);
  }
  return { header, rows: result.data };
}

export function gazetteerFromCsv(
  csv: string,
  columns: readonly string[],
  diagnostics: DiagnosticLog,
  source = 'reference data'
): Gazetteer {
  try {
    const { header, rows } = parseReferenceCsv(csv);
    if (rows.length === 0) {
      throw new ReferenceDataError(`Reference file is empty: ${source}`);
    }

    const present = new Set(header);
    const missing = columns.filter(column => !present.has(column));
    if (missing.length > 0) {
      diagnostics.record('reference-columns-missing', `Missing columns in reference file: ${missing.join(', ')}`, {
        source,
        missing
      });
    }

    const gazetteer = Gazetteer.build(rows, columns);
    logger.info(`Loaded ${gazetteer.size} unique locations from ${source}`);
    return gazetteer;
  } catch (error) {
    diagnostics.record('reference-unavailable', `Error loading reference file: ${errorMessage(error)}`, { source });
    return Gazetteer.empty();
  }
}

export async function loadGazetteer(
  filePath: string,
  columns: readonly string[],
  diagnostics: DiagnosticLog
): Promise<Gazetteer> {
  let csv: string;
  try {
    csv = await readFile(filePath, 'utf-8');
  } catch (error) {
    diagnostics.record('reference-unavailable', `Reference file could not be read: ${errorMessage(error)}`, {
      source: filePath
    });
    return Gazetteer.empty();
  }

  return gazetteerFromCsv(csv, columns, diagnostics, filePath);
}
