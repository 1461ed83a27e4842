import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { startPipeline, createRetentionHook } from '../pipeline';
import { MetricsTracker } from '../metrics-tracker';
import { NewsConnector, type FetchFn } from '../../ingestion/news-connector';
import { DocumentStore } from '../../ingestion/document-store';
import { SeenSet } from '../../ingestion/seen-set';
import { BruteForceVectorIndex } from '../../search/vector-index';
import { makeArticle, wordTokenizer, KeywordEmbedder } from '../../_tests/helpers';

const feed = {
  status: 'ok',
  articles: [
    { title: 'AI Breakthrough', description: 'New model released', url: 'https://x.com/a', source: { name: 'Tech News' } },
    { title: 'Crypto market slides', description: 'Prices fall', url: 'https://x.com/b', source: { name: 'Money Daily' } },
  ],
};

describe('startPipeline', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should index polled articles and shut down cleanly', async () => {
    const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => new Response(JSON.stringify(feed), { status: 200 }));
    const seen = new SeenSet();
    const index = new BruteForceVectorIndex();
    const metrics = new MetricsTracker();
    const connector = new NewsConnector({
      apiKey: 'test-news-key',
      categories: ['technology'],
      url: 'https://newsapi.test/v2/top-headlines',
      seen,
      fetchFn,
      metrics,
    });
    const documentStore = new DocumentStore({
      embedder: new KeywordEmbedder(),
      index,
      chunking: { tokenizer: wordTokenizer },
      metrics,
    });

    const pipeline = startPipeline({ connector, documentStore, metrics });

    await vi.waitFor(() => {
      expect(index.size()).toBe(2);
    });
    expect(pipeline.isRunning()).toBe(true);

    await pipeline.stop();

    expect(pipeline.isRunning()).toBe(false);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(seen.size).toBe(2);
    expect(metrics.getStats()).toMatchObject({ pollCycles: 1, articlesEmitted: 2, articlesIndexed: 2 });
    expect(index.search([0, 0, 1, 1, 0], 1)[0].entry.article.sourceName).toBe('Money Daily');
  });

  it('should allow stop to be called twice', async () => {
    const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => new Response(JSON.stringify({ status: 'ok', articles: [] }), { status: 200 }));
    const connector = new NewsConnector({ apiKey: 'test-news-key', categories: ['technology'], fetchFn });
    const documentStore = new DocumentStore({ embedder: new KeywordEmbedder(), index: new BruteForceVectorIndex() });

    const pipeline = startPipeline({ connector, documentStore });
    await pipeline.stop();
    await pipeline.stop();

    await expect(pipeline.done).resolves.toBeUndefined();
  });
});

describe('createRetentionHook', () => {
  it('should be absent when retention is disabled', () => {
    const store = new DocumentStore({ embedder: new KeywordEmbedder(), index: new BruteForceVectorIndex() });

    expect(createRetentionHook(store, 0)).toBeUndefined();
  });

  it('should evict entries older than the retention horizon', async () => {
    vi.useFakeTimers();
    try {
      const index = new BruteForceVectorIndex();
      const store = new DocumentStore({ embedder: new KeywordEmbedder(), index, chunking: { tokenizer: wordTokenizer } });

      vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
      await store.ingest(makeArticle({ url: 'https://x.com/old', text: 'AI old' }));
      vi.setSystemTime(new Date('2026-01-01T05:00:00Z'));
      await store.ingest(makeArticle({ url: 'https://x.com/new', text: 'AI new' }));

      const hook = createRetentionHook(store, 2);
      await hook?.({ categories: [], emitted: 0, durationMs: 0 });

      expect(index.size()).toBe(1);
      expect(index.search([1, 0, 0, 0, 0], 1)[0].entry.article.url).toBe('https://x.com/new');
    } finally {
      vi.useRealTimers();
    }
  });
});
