/**
 * Tracks in-memory metrics for the ingestion pipeline
 */

import type { PollCycleStats } from '../types';

export interface PipelineStats {
  pollCycles: number;
  failedCycles: number;
  consecutiveFailures: number;
  lastPollAt: Date | null;
  lastSuccessfulPollAt: Date | null;
  lastError: string | null;
  averagePollDurationMs: number;
  categoryFailures: number;
  articlesEmitted: number;
  articlesIndexed: number;
  articlesFailed: number;
  chunksIndexed: number;
  chunksEvicted: number;
}

export class MetricsTracker {
  private stats: PipelineStats = {
    pollCycles: 0,
    failedCycles: 0,
    consecutiveFailures: 0,
    lastPollAt: null,
    lastSuccessfulPollAt: null,
    lastError: null,
    averagePollDurationMs: 0,
    categoryFailures: 0,
    articlesEmitted: 0,
    articlesIndexed: 0,
    articlesFailed: 0,
    chunksIndexed: 0,
    chunksEvicted: 0,
  };

  /**
   * Record a completed poll cycle. A cycle where every category failed counts as a failure.
   */
  recordPollCycle(cycle: PollCycleStats): void {
    const failedCategories = cycle.categories.filter(c => c.error !== undefined);

    this.stats.pollCycles++;
    this.stats.lastPollAt = new Date();
    this.stats.articlesEmitted += cycle.emitted;
    this.stats.categoryFailures += failedCategories.length;

    const totalDuration = this.stats.averagePollDurationMs * (this.stats.pollCycles - 1);
    this.stats.averagePollDurationMs = (totalDuration + cycle.durationMs) / this.stats.pollCycles;

    if (cycle.categories.length > 0 && failedCategories.length === cycle.categories.length) {
      this.recordFailedCycle(failedCategories.map(c => `${c.category}: ${c.error}`).join('; '));
      return;
    }

    this.stats.consecutiveFailures = 0;
    this.stats.lastSuccessfulPollAt = new Date();
    if (failedCategories.length === 0) {
      this.stats.lastError = null;
    }
  }

  /**
   * Record a cycle aborted by an unexpected error
   */
  recordPollFailure(error: string): void {
    this.stats.pollCycles++;
    this.stats.lastPollAt = new Date();
    this.recordFailedCycle(error);
  }

  recordArticleIndexed(chunks: number): void {
    this.stats.articlesIndexed++;
    this.stats.chunksIndexed += chunks;
  }

  recordArticleFailed(): void {
    this.stats.articlesFailed++;
  }

  recordEviction(chunks: number): void {
    this.stats.chunksEvicted += chunks;
  }

  getStats(): PipelineStats {
    return { ...this.stats };
  }

  /**
   * Three or more consecutive failed cycles
   */
  isCriticalFailureState(): boolean {
    return this.stats.consecutiveFailures >= 3;
  }

  getConsecutiveFailures(): number {
    return this.stats.consecutiveFailures;
  }

  private recordFailedCycle(error: string): void {
    this.stats.failedCycles++;
    this.stats.consecutiveFailures++;
    this.stats.lastError = error;
  }
}
