/**
 * Streaming ingestion pipeline: news connector -> channel -> document store
 */

import type { Article } from '../types';
import { AsyncChannel, ChannelClosedError } from '../ingestion/channel';
import type { CycleHook, NewsConnector } from '../ingestion/news-connector';
import type { MetricsTracker } from './metrics-tracker';
import type { DocumentStore } from '../ingestion/document-store';
import { errorMessage } from '../utils/errors';
import { hoursAgo } from '../utils/time';
import { debugLogger } from '../utils/debug-logger';

const DEFAULT_CHANNEL_CAPACITY = 100;
const SHUTDOWN_TIMEOUT_MS = 30_000;

export interface PipelineOptions {
  connector: NewsConnector;
  documentStore: DocumentStore;
  metrics?: MetricsTracker;
  channelCapacity?: number;
  /** Evict chunks indexed longer ago than this; 0 keeps them forever */
  retentionHours?: number;
}

export interface PipelineHandle {
  /** Resolves when the poll loop and the consumer have both finished */
  readonly done: Promise<void>;
  isRunning(): boolean;
  stop(): Promise<void>;
}

/**
 * Index retention step run after every poll cycle
 */
export function createRetentionHook(
  documentStore: DocumentStore,
  retentionHours: number
): CycleHook | undefined {
  if (retentionHours <= 0) {
    return undefined;
  }

  return () => {
    documentStore.pruneOlderThan(hoursAgo(retentionHours));
  };
}

/**
 * Start polling and indexing concurrently. The connector produces into a bounded channel
 * that the document store drains on its own async activity.
 */
export function startPipeline(options: PipelineOptions): PipelineHandle {
  const channel = new AsyncChannel<Article>(options.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY);
  const controller = new AbortController();
  let running = true;

  debugLogger.info('SYSTEM', 'Starting ingestion pipeline', {
    channelCapacity: options.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY,
    retentionHours: options.retentionHours ?? 0
  });

  const consumer = options.documentStore.consume(channel);
  const retention = createRetentionHook(options.documentStore, options.retentionHours ?? 0);

  const producer = options.connector
    .run(channel.push, controller.signal, retention)
    .catch((error: unknown) => {
      // A closed channel during shutdown is expected; anything else ends the loop
      if (!(error instanceof ChannelClosedError)) {
        console.error(`❌ News connector exited: ${errorMessage(error)}`);
      }
    })
    .finally(() => channel.close());

  const done = Promise.all([producer, consumer])
    .then(() => undefined, (error: unknown) => {
      console.error(`❌ Document store consumer exited: ${errorMessage(error)}`);
    })
    .finally(() => {
      running = false;
    });

  return {
    done,
    isRunning: () => running,
    stop: async () => {
      if (!running) return;

      console.log('Stopping ingestion pipeline...');
      controller.abort();
      channel.close();

      let timer: NodeJS.Timeout | undefined;
      const timedOut = new Promise<'timeout'>(resolve => {
        timer = setTimeout(() => resolve('timeout'), SHUTDOWN_TIMEOUT_MS);
      });

      const outcome = await Promise.race([done.then(() => 'finished' as const), timedOut]);
      clearTimeout(timer);

      if (outcome === 'timeout') {
        console.warn('Ingestion pipeline did not finish within timeout period');
      } else {
        console.log('Ingestion pipeline shut down gracefully');
      }

      if (options.metrics) {
        const stats = options.metrics.getStats();
        console.log(`📊 ${stats.pollCycles} poll cycles, ${stats.articlesIndexed} articles indexed, ${stats.articlesFailed} failed`);
      }
    },
  };
}
