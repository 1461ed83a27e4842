/**
 * API endpoint for ingestion pipeline status and metrics
 */

import { Router } from 'express';
import type { MetricsTracker } from '../jobs/metrics-tracker';

export interface PipelineStatusSources {
  metrics: MetricsTracker;
  isRunning: () => boolean;
  pollIntervalMs: number;
  retentionHours: number;
  indexedChunks: () => number;
}

/**
 * GET /api/pipeline-status
 * Returns current status and metrics for the polling loop and the indexer
 */
export function createPipelineStatusRouter(sources: PipelineStatusSources): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const stats = sources.metrics.getStats();
    const running = sources.isRunning();

    const isHealthy = running && !sources.metrics.isCriticalFailureState();

    // Calculate time since last poll
    const timeSinceLastPollMs = stats.lastPollAt ? Date.now() - stats.lastPollAt.getTime() : null;

    res.json({
      healthy: isHealthy,
      pipeline: {
        running,
        pollIntervalSeconds: Math.round(sources.pollIntervalMs / 1000),
        retentionHours: sources.retentionHours,
      },
      polling: {
        cycles: stats.pollCycles,
        failedCycles: stats.failedCycles,
        consecutiveFailures: stats.consecutiveFailures,
        categoryFailures: stats.categoryFailures,
        averageDurationMs: Math.round(stats.averagePollDurationMs),
        lastPollAt: stats.lastPollAt?.toISOString() ?? null,
        lastSuccessfulPollAt: stats.lastSuccessfulPollAt?.toISOString() ?? null,
        timeSinceLastPollMs,
        lastError: stats.lastError,
      },
      indexing: {
        articlesEmitted: stats.articlesEmitted,
        articlesIndexed: stats.articlesIndexed,
        articlesFailed: stats.articlesFailed,
        chunksIndexed: stats.chunksIndexed,
        chunksEvicted: stats.chunksEvicted,
        indexedChunks: sources.indexedChunks(),
      },
    });
  });

  return router;
}
