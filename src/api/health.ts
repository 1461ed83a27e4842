import type { Request, Response, RequestHandler } from 'express';

export interface HealthSources {
  indexedChunks: () => number;
  seenArticles: () => number;
}

/**
 * GET /health. Answers 200 whenever the process is serving requests.
 */
export function createHealthCheck(sources: HealthSources): RequestHandler {
  return function healthCheck(_req: Request, res: Response): void {
    res.json({
      status: 'healthy',
      indexedChunks: sources.indexedChunks(),
      seenArticles: sources.seenArticles(),
      timestamp: new Date().toISOString()
    });
  };
}
