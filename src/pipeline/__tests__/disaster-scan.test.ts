/**
 * Tests for the full scan workflow with in-process feeds
 */

import { runDisasterScan } from '../disaster-scan';
import { ConfigurationError } from '../errors';
import { loadEnvironmentConfig } from '../../config/environment';
import { createFeedEntry, createStubEntityModel } from '../../__tests__/helpers';

const referenceFile = new URL('../../../data/locations.csv', import.meta.url).pathname;
const entriesFile = new URL('../../../data/sample-entries.json', import.meta.url).pathname;
const feedA = 'https://feeds.example.org/a';
const feedB = 'https://feeds.example.org/b';

describe('runDisasterScan', () => {
  const entityModel = createStubEntityModel({ Odisha: 'GPE', Shimla: 'GPE', Kochi: 'GPE' });
  const now = () => new Date(2024, 0, 2, 3, 4, 5);

  const fetchFeed = vi.fn(async (url: string) => {
    if (url === feedB) {
      throw new Error(`Error fetching feed ${url}: timeout`);
    }
    return [
      createFeedEntry({ sourceUrl: url }),
      createFeedEntry({ title: 'Local bakery wins award', description: 'Fresh bread every morning', sourceUrl: url })
    ];
  });

  it('should scan every feed and build the envelope', async () => {
    const config = loadEnvironmentConfig({ REFERENCE_FILE: referenceFile, FEED_URLS: `${feedA},${feedB}` });

    const result = await runDisasterScan(config, { fetchFeed, entityModel, now });

    expect(fetchFeed).toHaveBeenCalledTimes(2);
    expect(result.gazetteerSize).toBe(25);
    expect(result.feeds.map(feed => feed.success)).toEqual([true, false]);
    expect(result.stats).toEqual({ totalEntries: 2, assembled: 1, skipped: 1, failed: 0, cancelled: false });
    expect(result.diagnostics.map(d => d.kind)).toEqual(['feed-unavailable', 'not-relevant']);
    expect(result.envelope).toEqual({
      metadata: {
        timestamp: '2024-01-02 03:04:05',
        feeds: [feedA, feedB],
        total_locations: 25,
        total_disaster_articles: 1
      },
      disaster_articles: [
        {
          title: 'Cyclone hits Odisha',
          date: '2023-10-10 08:00:00',
          description: 'Officials began evacuation in Odisha state',
          link: 'https://news.example.org/cyclone-odisha',
          locations: ['odisha'],
          source: feedA,
          disaster_keywords: ['cyclone', 'evacuation']
        }
      ]
    });
  });

  it('should read a saved entries file instead of fetching', async () => {
    const config = loadEnvironmentConfig({ REFERENCE_FILE: referenceFile, ENTRIES_FILE: entriesFile });

    const result = await runDisasterScan(config, { fetchFeed, entityModel, now });

    expect(fetchFeed).not.toHaveBeenCalled();
    expect(result.feeds).toEqual([]);
    expect(result.envelope.metadata.feeds).toEqual([entriesFile]);
    expect(result.records.map(record => record.title)).toEqual(['Cyclone hits Odisha']);
    expect(result.stats).toEqual({ totalEntries: 3, assembled: 1, skipped: 2, failed: 0, cancelled: false });
  });

  it('should keep every complete entry when relevance filtering is off', async () => {
    const config = loadEnvironmentConfig({
      REFERENCE_FILE: referenceFile,
      ENTRIES_FILE: entriesFile,
      RELEVANT_ONLY: 'false'
    });

    const result = await runDisasterScan(config, { entityModel, now });

    expect(result.envelope.metadata.total_articles).toBe(2);
    expect(result.envelope.articles?.map(article => article.locations)).toEqual([['odisha'], ['kochi']]);
    expect(result.envelope.articles?.[1].disaster_keywords).toEqual([]);
  });

  it('should still run without reference data', async () => {
    const config = loadEnvironmentConfig({ REFERENCE_FILE: '/nonexistent/locations.csv', ENTRIES_FILE: entriesFile });

    const result = await runDisasterScan(config, { entityModel, now });

    expect(result.gazetteerSize).toBe(0);
    expect(result.records[0].locations).toEqual(['Unknown']);
    expect(result.diagnostics[0].kind).toBe('reference-unavailable');
  });

  it('should fail before fetching when the vocabulary is unknown', async () => {
    const config = loadEnvironmentConfig({ REFERENCE_FILE: referenceFile, DISASTER_VOCABULARY: 'volcanic' });

    await expect(runDisasterScan(config, { fetchFeed, entityModel, now })).rejects.toBeInstanceOf(ConfigurationError);
    expect(fetchFeed).not.toHaveBeenCalled();
  });
});
