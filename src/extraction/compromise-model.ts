import nlp from 'compromise';
import { EntityModelError, errorMessage } from '../pipeline/errors';
import { GPE_LABEL, type EntityModel, type TaggedEntity } from './entity-extractor';

// Leading/trailing punctuation compromise keeps on a span ("Odisha," -> "Odisha")
const EDGE_PUNCTUATION = /^[\s"'“”‘’(\[{.,;:!?-]+|[\s"'“”‘’)\]}.,;:!?-]+$/g;
// compromise keeps the possessive on the place term ("Kerala's floods")
const POSSESSIVE_SUFFIX = /['’]s$/i;

/**
 * Reduce a tagged span to the bare place name: edge punctuation and a
 * trailing possessive removed.
 */
export function cleanPlaceSpan(span: string): string {
  return span.replace(EDGE_PUNCTUATION, '').replace(POSSESSIVE_SUFFIX, '').replace(EDGE_PUNCTUATION, '');
}

export interface CompromiseEntityModelOptions {
  /** Extra words to tag as places, e.g. regional names the built-in lexicon lacks */
  places?: readonly string[];
}

/**
 * English entity model on compromise. Every span compromise tags as a place
 * (city, region, country) comes back labelled GPE.
 */
export class CompromiseEntityModel implements EntityModel {
  readonly name = 'compromise';
  private readonly lexicon: Record<string, string>;

  constructor(options: CompromiseEntityModelOptions = {}) {
    this.lexicon = {};
    for (const place of options.places ?? []) {
      const word = place.trim().toLowerCase();
      if (word) this.lexicon[word] = 'Place';
    }
  }

  tag(text: string): TaggedEntity[] {
    let spans: unknown;
    try {
      spans = nlp(text, this.lexicon).places().out('array');
    } catch (error) {
      throw new EntityModelError(`compromise could not tag text: ${errorMessage(error)}`, { cause: error });
    }
    if (!Array.isArray(spans)) {
      throw new EntityModelError('compromise returned no place spans');
    }

    const entities: TaggedEntity[] = [];
    for (const span of spans) {
      if (typeof span !== 'string') continue;
      const cleaned = cleanPlaceSpan(span);
      if (cleaned) {
        entities.push({ text: cleaned, label: GPE_LABEL });
      }
    }
    return entities;
  }
}
