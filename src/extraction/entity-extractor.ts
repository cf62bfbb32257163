/**
 * Named-entity extraction
 * Wraps a pluggable NLP model and keeps only place-like entities.
 */

import type { DiagnosticLog } from '../pipeline/diagnostics';
import { errorMessage } from '../pipeline/errors';
import { logger } from '../utils/logger';

export const GPE_LABEL = 'GPE';

export interface TaggedEntity {
  text: string;
  label: string;
}

/**
 * The NLP capability the extractor depends on. Implementations may throw;
 * the extractor turns that into an empty result.
 */
export interface EntityModel {
  readonly name: string;
  tag(text: string): TaggedEntity[];
}

export interface EntityExtractor {
  extractCandidates(text: string, diagnostics?: DiagnosticLog): Set<string>;
}

export interface NamedEntityExtractorOptions {
  labels?: readonly string[];
}

export class NamedEntityExtractor implements EntityExtractor {
  private readonly labels: ReadonlySet<string>;

  constructor(
    private readonly model: EntityModel,
    options: NamedEntityExtractorOptions = {}
  ) {
    this.labels = new Set(options.labels ?? [GPE_LABEL]);
  }

  extractCandidates(text: string, diagnostics?: DiagnosticLog): Set<string> {
    const candidates = new Set<string>();
    if (!text.trim()) return candidates;

    let entities: TaggedEntity[];
    try {
      entities = this.model.tag(text);
    } catch (error) {
      const message = `Entity model "${this.model.name}" failed: ${errorMessage(error)}`;
      if (diagnostics) {
        diagnostics.record('extractor-failure', message, { model: this.model.name });
      } else {
        logger.warn(message);
      }
      return candidates;
    }

    for (const entity of entities) {
      if (!this.labels.has(entity.label)) continue;
      const candidate = entity.text.trim().toLowerCase();
      if (candidate) candidates.add(candidate);
    }
    return candidates;
  }
}
