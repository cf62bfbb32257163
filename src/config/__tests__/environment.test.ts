/**
 * Tests for environment configuration loading
 */

import { DEFAULT_FEED_URLS, loadEnvironmentConfig } from '../environment';
import { ConfigurationError } from '../../pipeline/errors';

describe('loadEnvironmentConfig', () => {
  it('should fill in defaults', () => {
    expect(loadEnvironmentConfig({})).toEqual({
      feeds: { urls: DEFAULT_FEED_URLS, concurrencyLimit: 2, timeoutMs: 10000, retries: 2, entriesFile: undefined },
      gazetteer: { referenceFile: 'data/locations.csv', columns: ['name', 'subcountry', 'country'] },
      classifier: { vocabulary: 'extended', relevantOnly: true },
      extraction: { entityLabels: ['GPE'], locationStrategy: 'exact', fuzzyThreshold: 0.85, extraPlaces: [] },
      output: {
        format: 'json',
        csvFile: 'output/disaster_news.csv',
        jsonFile: 'output/disaster_news.json',
        listDelimiter: ', '
      },
      logging: { level: 'info' }
    });
  });

  it('should read overrides', () => {
    const config = loadEnvironmentConfig({
      FEED_URLS: 'https://a.example.org/rss, https://b.example.org/rss',
      FEED_CONCURRENCY_LIMIT: '4',
      ENTRIES_FILE: 'data/sample-entries.json',
      GAZETTEER_COLUMNS: 'City, State',
      DISASTER_VOCABULARY: 'basic',
      RELEVANT_ONLY: 'no',
      LOCATION_STRATEGY: 'fuzzy',
      FUZZY_THRESHOLD: '0.9',
      EXTRA_PLACES: 'Odisha,Kutch',
      OUTPUT_FORMAT: 'both',
      LOG_LEVEL: 'debug'
    });

    expect(config.feeds.urls).toEqual(['https://a.example.org/rss', 'https://b.example.org/rss']);
    expect(config.feeds.concurrencyLimit).toBe(4);
    expect(config.feeds.entriesFile).toBe('data/sample-entries.json');
    expect(config.gazetteer.columns).toEqual(['City', 'State']);
    expect(config.classifier).toEqual({ vocabulary: 'basic', relevantOnly: false });
    expect(config.extraction).toEqual({
      entityLabels: ['GPE'],
      locationStrategy: 'fuzzy',
      fuzzyThreshold: 0.9,
      extraPlaces: ['Odisha', 'Kutch']
    });
    expect(config.output.format).toBe('both');
    expect(config.logging.level).toBe('debug');
  });

  it('should treat empty values as unset', () => {
    const config = loadEnvironmentConfig({ FEED_CONCURRENCY_LIMIT: '', RELEVANT_ONLY: '', FEED_URLS: '' });

    expect(config.feeds.concurrencyLimit).toBe(2);
    expect(config.classifier.relevantOnly).toBe(true);
    expect(config.feeds.urls).toEqual(DEFAULT_FEED_URLS);
  });

  it('should report every invalid variable at once', () => {
    let caught: unknown;
    try {
      loadEnvironmentConfig({ FEED_CONCURRENCY_LIMIT: '0', RELEVANT_ONLY: 'maybe' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.issues).toEqual([
        'FEED_CONCURRENCY_LIMIT: Number must be greater than 0',
        'RELEVANT_ONLY: Expected a boolean, got "maybe"'
      ]);
    }
  });

  it('should reject malformed feed URLs and unknown options', () => {
    expect(() => loadEnvironmentConfig({ FEED_URLS: 'not-a-url' })).toThrow(ConfigurationError);
    expect(() => loadEnvironmentConfig({ LOCATION_STRATEGY: 'phonetic' })).toThrow(ConfigurationError);
    expect(() => loadEnvironmentConfig({ FUZZY_THRESHOLD: '1.2' })).toThrow(ConfigurationError);
  });
});
