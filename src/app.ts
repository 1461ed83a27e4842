import express, { type Express } from 'express';
import {
  securityHeaders,
  createCorsMiddleware,
  createRateLimiter,
  createErrorHandler,
  notFound,
  requestLogger
} from './api/middleware';
import { createChatHandler } from './api/chat';
import { createHealthCheck } from './api/health';
import { createPipelineStatusRouter } from './api/pipeline-status';
import type { Answerer } from './search/query-engine';
import type { MetricsTracker } from './jobs/metrics-tracker';

export interface AppDependencies {
  answerer: Answerer;
  metrics: MetricsTracker;
  indexedChunks: () => number;
  seenArticles: () => number;
  pipelineRunning: () => boolean;
  server: {
    requestTimeoutMs: number;
    chatRateLimitPerMinute: number;
    frontendUrl?: string;
    isProduction: boolean;
    isDevelopment: boolean;
  };
  pollIntervalMs: number;
  retentionHours: number;
  /** Skip per-request log lines (tests) */
  quiet?: boolean;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Trust only the first proxy so rate limiting sees real client addresses behind one
  if (deps.server.isProduction) {
    app.set('trust proxy', 1);
  }

  app.use(securityHeaders);
  app.use(express.json({ limit: '16kb' }));
  app.use(createCorsMiddleware(deps.server));
  if (!deps.quiet) {
    app.use(requestLogger);
  }

  // API routes
  app.get('/health', createHealthCheck({
    indexedChunks: deps.indexedChunks,
    seenArticles: deps.seenArticles
  }));
  app.post(
    '/v1/chat',
    createRateLimiter(deps.server.chatRateLimitPerMinute),
    createChatHandler({ answerer: deps.answerer, requestTimeoutMs: deps.server.requestTimeoutMs })
  );
  app.use('/api/pipeline-status', createPipelineStatusRouter({
    metrics: deps.metrics,
    isRunning: deps.pipelineRunning,
    pollIntervalMs: deps.pollIntervalMs,
    retentionHours: deps.retentionHours,
    indexedChunks: deps.indexedChunks
  }));

  app.use(notFound);
  app.use(createErrorHandler(deps.server));

  return app;
}
