import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { NewsConnector, toArticle, type FetchFn } from '../news-connector';
import { SeenSet } from '../seen-set';
import { MetricsTracker } from '../../jobs/metrics-tracker';
import { ConfigurationError } from '../../utils/errors';
import type { Article } from '../../types';

const API_URL = 'https://newsapi.test/v2/top-headlines';

const twoArticles = {
  status: 'ok',
  totalResults: 2,
  articles: [
    {
      title: 'AI Breakthrough',
      description: 'New model released',
      url: 'https://x.com/a',
      publishedAt: '2026-01-18T12:00:00Z',
      source: { id: null, name: 'Tech News' },
    },
    {
      title: 'Markets rally!',
      description: 'Stocks close higher',
      url: 'https://x.com/b',
      publishedAt: '2026-01-18T13:00:00Z',
      source: { name: 'Money Daily' },
    },
  ],
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function collector(): { articles: Article[]; emit: (article: Article) => Promise<void> } {
  const articles: Article[] = [];
  return {
    articles,
    emit: async (article) => {
      articles.push(article);
    },
  };
}

describe('NewsConnector', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('constructor', () => {
    it('should reject a placeholder API key', () => {
      expect(() => new NewsConnector({ apiKey: 'your_key_here', categories: ['technology'] }))
        .toThrow(ConfigurationError);
    });

    it('should reject an empty category list', () => {
      expect(() => new NewsConnector({ apiKey: 'test-news-key', categories: [] }))
        .toThrow('At least one news category is required');
    });
  });

  describe('pollOnce', () => {
    it('should request each category with the provider query parameters', async () => {
      const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse({ status: 'ok', articles: [] }));
      const connector = new NewsConnector({
        apiKey: 'test-news-key',
        categories: ['technology', 'business'],
        url: API_URL,
        pageSize: 10,
        fetchFn,
      });

      await connector.pollOnce(collector().emit);

      expect(fetchFn).toHaveBeenCalledTimes(2);
      const requested = new URL(String(fetchFn.mock.calls[0][0]));
      expect(`${requested.origin}${requested.pathname}`).toBe(API_URL);
      expect(Object.fromEntries(requested.searchParams)).toEqual({
        apiKey: 'test-news-key',
        category: 'technology',
        language: 'en',
        pageSize: '10',
        sortBy: 'publishedAt',
      });
      expect(new URL(String(fetchFn.mock.calls[1][0])).searchParams.get('category')).toBe('business');
    });

    it('should emit each article once across identical cycles', async () => {
      const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse(twoArticles));
      const seen = new SeenSet();
      const connector = new NewsConnector({ apiKey: 'test-news-key', categories: ['technology'], url: API_URL, seen, fetchFn });
      const sink = collector();

      const first = await connector.pollOnce(sink.emit);
      const second = await connector.pollOnce(sink.emit);

      expect(first.emitted).toBe(2);
      expect(second.emitted).toBe(0);
      expect(second.categories).toEqual([{ category: 'technology', fetched: 2, emitted: 0 }]);
      expect(sink.articles.map(a => a.url)).toEqual(['https://x.com/a', 'https://x.com/b']);
      expect(seen.size).toBe(2);
      expect(connector.seenCount).toBe(2);
    });

    it('should emit complete articles', async () => {
      const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse(twoArticles));
      const connector = new NewsConnector({ apiKey: 'test-news-key', categories: ['technology'], url: API_URL, fetchFn });
      const sink = collector();

      await connector.pollOnce(sink.emit);

      expect(sink.articles[0]).toEqual({
        id: 'https://x.com/a',
        url: 'https://x.com/a',
        title: 'AI Breakthrough',
        description: 'New model released',
        text: 'AI Breakthrough. New model released',
        publishedAt: '2026-01-18T12:00:00Z',
        sourceName: 'Tech News',
        category: 'technology',
      });
      expect(sink.articles[1].text).toBe('Markets rally! Stocks close higher');
      expect(Object.isFrozen(sink.articles[0])).toBe(true);
    });

    it('should skip items without a url and record removed items as seen', async () => {
      const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse({
        status: 'ok',
        articles: [
          { title: 'No link', description: 'Missing url', url: null },
          { title: '[Removed]', description: '[Removed]', url: 'https://x.com/removed' },
          { title: 'Kept', description: null, url: ' https://x.com/kept ' },
        ],
      }));
      const seen = new SeenSet();
      const connector = new NewsConnector({ apiKey: 'test-news-key', categories: ['technology'], url: API_URL, seen, fetchFn });
      const sink = collector();

      const stats = await connector.pollOnce(sink.emit);

      expect(stats.emitted).toBe(1);
      expect(sink.articles.map(a => a.url)).toEqual(['https://x.com/kept']);
      expect(seen.has('https://x.com/removed')).toBe(true);
      expect(seen.size).toBe(2);
    });

    it('should report an error status without emitting', async () => {
      const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse(
        { status: 'error', code: 'apiKeyInvalid', message: 'Your API key is invalid' },
        401
      ));
      const connector = new NewsConnector({ apiKey: 'test-news-key', categories: ['technology'], url: API_URL, fetchFn });
      const sink = collector();

      const stats = await connector.pollOnce(sink.emit);

      expect(sink.articles).toEqual([]);
      expect(stats.categories).toEqual([{
        category: 'technology',
        fetched: 0,
        emitted: 0,
        error: 'API returned non-OK status: Your API key is invalid',
      }]);
    });

    it('should classify an HTTP failure with a non-JSON body', async () => {
      const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => new Response('Bad Gateway', { status: 502 }));
      const connector = new NewsConnector({ apiKey: 'test-news-key', categories: ['technology'], url: API_URL, fetchFn });

      const stats = await connector.pollOnce(collector().emit);

      expect(stats.categories[0].error).toBe('HTTP 502');
    });

    it('should classify an unparseable success body as malformed', async () => {
      const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => new Response('not json', { status: 200 }));
      const connector = new NewsConnector({ apiKey: 'test-news-key', categories: ['technology'], url: API_URL, fetchFn });

      const stats = await connector.pollOnce(collector().emit);

      expect(stats.categories[0].error).toMatch(/^Invalid JSON in response: /);
    });

    it('should classify a network failure', async () => {
      const fetchFn = vi.fn<FetchFn>().mockRejectedValue(new TypeError('fetch failed'));
      const connector = new NewsConnector({ apiKey: 'test-news-key', categories: ['technology'], url: API_URL, fetchFn });

      const stats = await connector.pollOnce(collector().emit);

      expect(stats.categories[0].error).toBe('Network error: fetch failed');
    });

    it('should time out a slow provider', async () => {
      const fetchFn: FetchFn = (_input, init) => new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
      const connector = new NewsConnector({
        apiKey: 'test-news-key',
        categories: ['technology'],
        url: API_URL,
        fetchTimeoutMs: 20,
        fetchFn,
      });

      const stats = await connector.pollOnce(collector().emit);

      expect(stats.categories[0].error).toBe('Request timed out after 20ms');
    });

    it('should keep polling the other categories when one fails', async () => {
      const fetchFn = vi.fn<FetchFn>().mockImplementation(async (input) => {
        return new URL(input).searchParams.get('category') === 'technology'
          ? new Response('Service Unavailable', { status: 503 })
          : jsonResponse(twoArticles);
      });
      const connector = new NewsConnector({
        apiKey: 'test-news-key',
        categories: ['technology', 'business'],
        url: API_URL,
        fetchFn,
      });
      const sink = collector();

      const stats = await connector.pollOnce(sink.emit);

      expect(stats.emitted).toBe(2);
      expect(stats.categories).toEqual([
        { category: 'technology', fetched: 0, emitted: 0, error: 'HTTP 503' },
        { category: 'business', fetched: 2, emitted: 2 },
      ]);
      expect(sink.articles.every(a => a.category === 'business')).toBe(true);
    });
  });

  describe('run', () => {
    it('should keep polling through provider errors, pausing a full interval each time', async () => {
      const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse(
        { status: 'error', code: 'apiKeyInvalid', message: 'Your API key is invalid' },
        401
      ));
      const controller = new AbortController();
      const sleeps: number[] = [];
      const metrics = new MetricsTracker();
      const connector = new NewsConnector({
        apiKey: 'test-news-key',
        categories: ['technology'],
        url: API_URL,
        fetchFn,
        metrics,
        sleep: async (ms) => {
          sleeps.push(ms);
          if (sleeps.length === 2) controller.abort();
        },
      });
      const sink = collector();

      await connector.run(sink.emit, controller.signal);

      expect(sink.articles).toEqual([]);
      expect(sleeps).toEqual([60_000, 60_000]);
      expect(fetchFn).toHaveBeenCalledTimes(2);
      expect(metrics.getStats().failedCycles).toBe(2);
      expect(metrics.getStats().lastError).toBe('technology: API returned non-OK status: Your API key is invalid');
    });

    it('should pause one interval after an unexpected error and carry on', async () => {
      const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse(twoArticles));
      const controller = new AbortController();
      const sleeps: number[] = [];
      const metrics = new MetricsTracker();
      const connector = new NewsConnector({
        apiKey: 'test-news-key',
        categories: ['technology'],
        url: API_URL,
        pollIntervalMs: 5_000,
        fetchFn,
        metrics,
        sleep: async (ms) => {
          sleeps.push(ms);
          controller.abort();
        },
      });

      await connector.run(async () => {
        throw new Error('disk full');
      }, controller.signal);

      expect(sleeps).toEqual([5_000]);
      expect(metrics.getStats().lastError).toBe('disk full');
      expect(console.error).toHaveBeenCalledWith('❌ Unexpected error in news connector: disk full');
    });

    it('should call the cycle hook after every completed cycle', async () => {
      const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse(twoArticles));
      const controller = new AbortController();
      const connector = new NewsConnector({
        apiKey: 'test-news-key',
        categories: ['technology'],
        url: API_URL,
        fetchFn,
        sleep: async () => controller.abort(),
      });
      const onCycle = vi.fn();

      await connector.run(collector().emit, controller.signal, onCycle);

      expect(onCycle).toHaveBeenCalledTimes(1);
      expect(onCycle.mock.calls[0][0]).toMatchObject({ emitted: 2 });
    });

    it('should log a failing cycle hook without counting the cycle again', async () => {
      const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse(twoArticles));
      const controller = new AbortController();
      const metrics = new MetricsTracker();
      const connector = new NewsConnector({
        apiKey: 'test-news-key',
        categories: ['technology'],
        url: API_URL,
        fetchFn,
        metrics,
        sleep: async () => controller.abort(),
      });

      await connector.run(collector().emit, controller.signal, () => {
        throw new Error('prune failed');
      });

      const stats = metrics.getStats();
      expect(stats.pollCycles).toBe(1);
      expect(stats.failedCycles).toBe(0);
      expect(stats.lastError).toBeNull();
      expect(console.error).toHaveBeenCalledWith('❌ Cycle hook failed: prune failed');
    });

    it('should not poll when already aborted', async () => {
      const fetchFn = vi.fn<FetchFn>();
      const controller = new AbortController();
      controller.abort();
      const connector = new NewsConnector({ apiKey: 'test-news-key', categories: ['technology'], fetchFn });

      await connector.run(collector().emit, controller.signal);

      expect(fetchFn).not.toHaveBeenCalled();
    });
  });
});

describe('toArticle', () => {
  const fetchedAt = '2026-02-01T00:00:00.000Z';

  it('should fall back to the fetch time and an unknown source', () => {
    const article = toArticle({ title: 'Headline', url: 'https://x.com/h' }, 'https://x.com/h', 'science', fetchedAt);

    expect(article).toMatchObject({
      title: 'Headline',
      description: '',
      text: 'Headline',
      publishedAt: fetchedAt,
      sourceName: 'Unknown',
      category: 'science',
    });
  });

  it('should use the description alone when the title is empty', () => {
    const article = toArticle({ title: '', description: 'Only a summary' }, 'https://x.com/d', 'science', fetchedAt);

    expect(article?.title).toBe('Only a summary');
    expect(article?.text).toBe('Only a summary');
  });

  it('should strip markup from provider text', () => {
    const article = toArticle(
      { title: '<b>Chip</b> maker &amp; partners', description: '<p>Deal signed</p>' },
      'https://x.com/c',
      'business',
      fetchedAt
    );

    expect(article?.text).toBe('Chip maker & partners. Deal signed');
  });

  it('should drop removed and empty items', () => {
    expect(toArticle({ title: '[Removed]', description: 'x' }, 'https://x.com/r', 'business', fetchedAt)).toBeNull();
    expect(toArticle({ title: null, description: '  ' }, 'https://x.com/e', 'business', fetchedAt)).toBeNull();
  });
});
