/**
 * Pipeline driver
 * Runs the assembler over every entry in order. One bad entry never aborts
 * the run; it is recorded and the next entry is processed.
 */

import type { Gazetteer } from '../gazetteer/gazetteer';
import type { FeedEntry, OutputRecord } from '../types/feed';
import { logger } from '../utils/logger';
import { DiagnosticLog, type Diagnostic } from './diagnostics';
import { PipelineError, errorMessage } from './errors';
import { RecordAssembler, type AssemblerComponents, type AssemblyPolicy } from './record-assembler';

export interface PipelineStats {
  totalEntries: number;
  assembled: number;
  skipped: number;
  failed: number;
  cancelled: boolean;
}

export interface PipelineRunResult {
  records: OutputRecord[];
  diagnostics: Diagnostic[];
  stats: PipelineStats;
}

export interface PipelineRunOptions {
  /** Checked between entries; an entry in progress always completes */
  signal?: AbortSignal;
  diagnostics?: DiagnosticLog;
}

export class PipelineDriver {
  constructor(
    private readonly components: AssemblerComponents,
    private readonly policy: Partial<AssemblyPolicy> = {}
  ) {}

  run(entries: Iterable<FeedEntry>, gazetteer: Gazetteer, options: PipelineRunOptions = {}): PipelineRunResult {
    const diagnostics = options.diagnostics ?? new DiagnosticLog();
    const assembler = new RecordAssembler({
      ...this.components,
      gazetteer,
      policy: this.policy,
      diagnostics
    });

    const records: OutputRecord[] = [];
    const stats: PipelineStats = { totalEntries: 0, assembled: 0, skipped: 0, failed: 0, cancelled: false };

    let index = 0;
    for (const entry of entries) {
      if (options.signal?.aborted) {
        stats.cancelled = true;
        diagnostics.record('run-cancelled', `Run cancelled after ${index} entries`, { processed: index });
        break;
      }

      stats.totalEntries++;
      try {
        const record = assembler.assemble(entry);
        if (record) {
          records.push(record);
          stats.assembled++;
        } else {
          stats.skipped++;
        }
      } catch (error) {
        stats.failed++;
        const kind = error instanceof PipelineError ? error.kind : 'entry-failed';
        diagnostics.record(kind, `Error processing entry ${index}: ${errorMessage(error)}`, {
          index,
          link: entry.link ?? undefined,
          source: entry.sourceUrl ?? undefined
        });
      }
      index++;
    }

    logger.info('Pipeline run completed', stats);
    return { records, diagnostics: diagnostics.all(), stats };
  }
}
