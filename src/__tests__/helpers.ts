/**
 * Shared fixtures for the test suites
 */

import type { EntityModel, TaggedEntity } from '../extraction/entity-extractor';
import type { FeedEntry } from '../types/feed';

/**
 * Entity model stub that tags the given words (case-sensitive) wherever
 * they occur in the text.
 */
export const createStubEntityModel = (
  entities: Record<string, string>,
  name = 'stub'
): EntityModel => ({
  name,
  tag: (text: string): TaggedEntity[] =>
    Object.entries(entities)
      .filter(([word]) => text.includes(word))
      .map(([word, label]) => ({ text: word, label }))
});

export const createFailingEntityModel = (message = 'model not loaded'): EntityModel => ({
  name: 'failing',
  tag: () => {
    throw new Error(message);
  }
});

export const createFeedEntry = (overrides: Partial<FeedEntry> = {}): FeedEntry => ({
  title: 'Cyclone hits Odisha',
  description: 'Officials began evacuation in Odisha state',
  link: 'https://news.example.org/cyclone-odisha',
  publishedAt: 'Tue, 10 Oct 2023 08:00:00 +0000',
  sourceUrl: 'https://news.example.org/rss',
  ...overrides
});
