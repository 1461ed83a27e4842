import type { Article, CategoryPollStats, PollCycleStats } from '../types';
import { NewsApiResponseSchema, type NewsApiArticle } from '../schemas';
import { isPlaceholderCredential } from '../config';
import { SeenSet } from './seen-set';
import { MetricsTracker } from '../jobs/metrics-tracker';
import { ConfigurationError, UpstreamError, errorMessage } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';
import { sanitizeForLog, stripHtml } from '../utils/sanitize';
import { sleep as defaultSleep, type Sleep } from '../utils/time';

export const DEFAULT_NEWS_API_URL = 'https://newsapi.org/v2/top-headlines';
export const DEFAULT_POLL_INTERVAL_MS = 60_000;

/**
 * Title NewsAPI substitutes for articles withdrawn by the publisher
 */
const REMOVED_MARKER = '[Removed]';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type ArticleSink = (article: Article) => Promise<void>;

export interface NewsConnectorOptions {
  apiKey: string;
  categories: string[];
  url?: string;
  language?: string;
  pageSize?: number;
  pollIntervalMs?: number;
  fetchTimeoutMs?: number;
  seen?: SeenSet;
  fetchFn?: FetchFn;
  sleep?: Sleep;
  metrics?: MetricsTracker;
}

export type CycleHook = (stats: PollCycleStats) => void | Promise<void>;

function joinTitleAndDescription(title: string, description: string): string {
  if (!description) return title;
  if (!title) return description;
  return /[.!?]$/.test(title) ? `${title} ${description}` : `${title}. ${description}`;
}

/**
 * Normalize one provider item into an Article, or null when it carries no usable text
 */
export function toArticle(
  item: NewsApiArticle,
  identity: string,
  category: string,
  fetchedAt: string
): Article | null {
  const title = stripHtml(item.title ?? '');
  if (title === REMOVED_MARKER) {
    return null;
  }

  const description = stripHtml(item.description ?? '');
  const text = joinTitleAndDescription(title, description);
  if (!text) {
    return null;
  }

  return Object.freeze({
    id: identity,
    url: identity,
    title: title || description,
    description,
    text,
    publishedAt: item.publishedAt?.trim() || fetchedAt,
    sourceName: item.source?.name?.trim() || 'Unknown',
    category,
  });
}

/**
 * Polls a NewsAPI-style feed per category on a fixed interval and emits each article once.
 *
 * Per-category failures (timeout, transport, bad payload, error status) skip that category for
 * the cycle. Anything else escaping a cycle is logged and followed by a full interval pause.
 */
export class NewsConnector {
  private readonly apiKey: string;
  private readonly url: string;
  private readonly categories: string[];
  private readonly language: string;
  private readonly pageSize: number;
  private readonly pollIntervalMs: number;
  private readonly fetchTimeoutMs: number;
  private readonly seen: SeenSet;
  private readonly fetchFn: FetchFn;
  private readonly sleep: Sleep;
  private readonly metrics?: MetricsTracker;

  constructor(options: NewsConnectorOptions) {
    if (isPlaceholderCredential(options.apiKey)) {
      throw new ConfigurationError([
        'NEWS_API_KEY not configured. Set it in the .env file (get a key from https://newsapi.org/register)'
      ]);
    }
    if (options.categories.length === 0) {
      throw new ConfigurationError(['At least one news category is required']);
    }

    this.apiKey = options.apiKey;
    this.url = options.url ?? DEFAULT_NEWS_API_URL;
    this.categories = [...options.categories];
    this.language = options.language ?? 'en';
    this.pageSize = options.pageSize ?? 20;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 10_000;
    this.seen = options.seen ?? new SeenSet();
    this.fetchFn = options.fetchFn ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.metrics = options.metrics;
  }

  get seenCount(): number {
    return this.seen.size;
  }

  /**
   * Poll until the signal aborts. Never rejects on upstream failures.
   * `onCycle` runs after every completed cycle, e.g. for index retention.
   */
  async run(emit: ArticleSink, signal?: AbortSignal, onCycle?: CycleHook): Promise<void> {
    const intervalSeconds = Math.round(this.pollIntervalMs / 1000);
    console.log('🔴 News connector started');
    console.log(`📡 Fetching ${this.categories.join(', ')} news every ${intervalSeconds} seconds`);

    while (!signal?.aborted) {
      try {
        const stats = await this.pollOnce(emit);
        this.metrics?.recordPollCycle(stats);
        await this.runCycleHook(onCycle, stats);
      } catch (error) {
        if (signal?.aborted) break;

        const message = errorMessage(error);
        this.metrics?.recordPollFailure(message);
        console.error(`❌ Unexpected error in news connector: ${sanitizeForLog(message).substring(0, 200)}`);
        console.error(`   Continuing after ${intervalSeconds}s pause...`);

        if (this.metrics?.isCriticalFailureState()) {
          console.error(`🚨 CRITICAL: News polling has failed ${this.metrics.getConsecutiveFailures()} times consecutively!`);
        }
      }

      if (signal?.aborted) break;

      debugLogger.info('POLL', `Waiting ${intervalSeconds} seconds before next poll`);
      await this.sleep(this.pollIntervalMs, signal);
    }

    console.log('🛑 News connector stopped');
  }

  private async runCycleHook(onCycle: CycleHook | undefined, stats: PollCycleStats): Promise<void> {
    if (!onCycle) return;
    try {
      await onCycle(stats);
    } catch (error) {
      console.error(`❌ Cycle hook failed: ${sanitizeForLog(errorMessage(error)).substring(0, 200)}`);
    }
  }

  /**
   * One poll cycle over every configured category, in order.
   * Each new article is recorded as seen before it is handed to `emit`.
   */
  async pollOnce(emit: ArticleSink): Promise<PollCycleStats> {
    const startTime = Date.now();
    const categories: CategoryPollStats[] = [];
    let emitted = 0;

    for (const category of this.categories) {
      const stepId = debugLogger.stepStart('NEWS_FETCH', `Fetching ${category} news`, {
        category,
        pageSize: this.pageSize
      });

      let items: NewsApiArticle[];
      try {
        items = await this.fetchCategory(category);
      } catch (error) {
        if (!(error instanceof UpstreamError)) throw error;

        debugLogger.stepError(stepId, 'NEWS_FETCH', `Skipping ${category} this cycle`, error);
        console.warn(`⚠️  Skipping ${category} news this cycle (${error.kind}): ${sanitizeForLog(error.message).substring(0, 200)}`);
        categories.push({ category, fetched: 0, emitted: 0, error: error.message });
        continue;
      }

      const fetchedAt = new Date().toISOString();
      let categoryEmitted = 0;

      for (const item of items) {
        const identity = item.url?.trim() ?? '';
        if (!identity || this.seen.has(identity)) {
          continue;
        }

        this.seen.add(identity);

        const article = toArticle(item, identity, category, fetchedAt);
        if (!article) {
          debugLogger.info('NEWS_FETCH', 'Skipping item without usable text', { url: identity });
          continue;
        }

        await emit(article);
        categoryEmitted++;
      }

      if (categoryEmitted === 0) {
        debugLogger.info('NEWS_FETCH', `No new ${category} articles (all previously seen)`);
      } else {
        console.log(`📰 Found ${categoryEmitted} new ${category} articles`);
      }

      debugLogger.stepFinish(stepId, { fetched: items.length, emitted: categoryEmitted });
      categories.push({ category, fetched: items.length, emitted: categoryEmitted });
      emitted += categoryEmitted;
    }

    return { categories, emitted, durationMs: Date.now() - startTime };
  }

  private async fetchCategory(category: string): Promise<NewsApiArticle[]> {
    const params = new URLSearchParams({
      apiKey: this.apiKey,
      category,
      language: this.language,
      pageSize: String(this.pageSize),
      sortBy: 'publishedAt',
    });

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.fetchTimeoutMs);

    let status: number;
    let ok: boolean;
    let body: string;
    try {
      const response = await this.fetchFn(`${this.url}?${params.toString()}`, {
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
      status = response.status;
      ok = response.ok;
      body = await response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new UpstreamError('timeout', `Request timed out after ${this.fetchTimeoutMs}ms`, { cause: error });
      }
      throw new UpstreamError('transport', `Network error: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      if (!ok) {
        throw new UpstreamError('status', `HTTP ${status}`);
      }
      throw new UpstreamError('malformed', `Invalid JSON in response: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = NewsApiResponseSchema.safeParse(payload);
    if (!parsed.success) {
      if (!ok) {
        throw new UpstreamError('status', `HTTP ${status}`);
      }
      throw new UpstreamError('malformed', `Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    if (parsed.data.status !== 'ok') {
      throw new UpstreamError('status', `API returned non-OK status: ${parsed.data.message ?? 'Unknown error'}`);
    }

    if (!ok) {
      throw new UpstreamError('status', `HTTP ${status}`);
    }

    return parsed.data.articles ?? [];
  }
}
