/**
 * Named keyword vocabularies, read from vocabularies.json next to this file
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../pipeline/errors';

const vocabulariesSchema = z.record(z.array(z.string().min(1)).min(1));

export type VocabularyCatalog = z.infer<typeof vocabulariesSchema>;

let _catalog: VocabularyCatalog | null = null;

export function loadVocabularyCatalog(): VocabularyCatalog {
  if (!_catalog) {
    const raw = readFileSync(new URL('./vocabularies.json', import.meta.url), 'utf-8');
    _catalog = vocabulariesSchema.parse(JSON.parse(raw));
  }
  return _catalog;
}

export function vocabularyNames(): string[] {
  return Object.keys(loadVocabularyCatalog());
}

export function getVocabulary(name: string): readonly string[] {
  const vocabulary = loadVocabularyCatalog()[name];
  if (!vocabulary) {
    throw new ConfigurationError([`DISASTER_VOCABULARY: unknown vocabulary "${name}" (available: ${vocabularyNames().join(', ')})`]);
  }
  return vocabulary;
}
