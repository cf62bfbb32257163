/**
 * Diagnostics for degraded paths
 * Every place the pipeline degrades instead of failing records one entry here,
 * so a run reports which path was taken and not only that nothing threw.
 */

import { logger, type LogLevel } from '../utils/logger';

export type DiagnosticKind =
  | 'missing-field'
  | 'not-relevant'
  | 'entry-failed'
  | 'unparseable-date'
  | 'extractor-failure'
  | 'reference-unavailable'
  | 'reference-columns-missing'
  | 'feed-unavailable'
  | 'run-cancelled';

export const DIAGNOSTIC_LEVELS: Record<DiagnosticKind, LogLevel> = {
  'missing-field': 'warn',
  'not-relevant': 'debug',
  'entry-failed': 'error',
  'unparseable-date': 'warn',
  'extractor-failure': 'warn',
  'reference-unavailable': 'error',
  'reference-columns-missing': 'warn',
  'feed-unavailable': 'error',
  'run-cancelled': 'warn'
};

export interface Diagnostic {
  kind: DiagnosticKind;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

export class DiagnosticLog {
  private readonly items: Diagnostic[] = [];

  record(kind: DiagnosticKind, message: string, context?: Record<string, unknown>): Diagnostic {
    const diagnostic: Diagnostic = { kind, level: DIAGNOSTIC_LEVELS[kind], message, context };
    this.items.push(diagnostic);
    logger.log(diagnostic.level, message, context);
    return diagnostic;
  }

  ofKind(kind: DiagnosticKind): Diagnostic[] {
    return this.items.filter(item => item.kind === kind);
  }

  all(): Diagnostic[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }
}
