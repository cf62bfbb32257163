import type { DiagnosticKind } from './diagnostics';

/**
 * Base error for failures the pipeline knows how to classify.
 */
export class PipelineError extends Error {
  readonly kind: DiagnosticKind;

  constructor(kind: DiagnosticKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.kind = kind;
  }
}

export class ReferenceDataError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('reference-unavailable', message, options);
    this.name = 'ReferenceDataError';
  }
}

export class EntityModelError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('extractor-failure', message, options);
    this.name = 'EntityModelError';
  }
}

export class FeedFetchError extends PipelineError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super('feed-unavailable', message, options);
    this.name = 'FeedFetchError';
    this.url = url;
  }
}

/**
 * Raised at start-up only; never during a run.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
