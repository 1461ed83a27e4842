import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { HttpError } from '../utils/errors';
import { sanitizeForLog } from '../utils/sanitize';

/**
 * Security headers middleware using helmet. The API serves JSON only.
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'same-origin' },
  dnsPrefetchControl: { allow: false },
  frameguard: { action: 'deny' },
  hsts: {
    maxAge: 31536000, // 1 year
    includeSubDomains: true,
  },
  noSniff: true,
  referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
});

// CORS: an explicit FRONTEND_URL wins; otherwise any origin in production
// and the local dashboard in development
export function createCorsMiddleware(options: { frontendUrl?: string; isProduction: boolean }): RequestHandler {
  return cors({
    origin: options.frontendUrl || (options.isProduction ? true : 'http://localhost:5173'),
    credentials: true
  });
}

/**
 * Per-client limit on chat requests. One limiter per app so each app keeps its own counters.
 */
export function createRateLimiter(perMinute: number): RequestHandler {
  return rateLimit({
    windowMs: 60 * 1000,
    max: perMinute,
    message: { error: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false
  });
}

export function notFound(req: Request, res: Response): void {
  res.status(404).json({ error: `Not found: ${req.method} ${req.path}` });
}

export function createErrorHandler(options: { isDevelopment: boolean }) {
  return function errorHandler(
    err: unknown,
    _req: Request,
    res: Response,
    _next: NextFunction
  ): void {
    if (err instanceof HttpError) {
      if (err.status >= 500) {
        console.error(`${err.name}: ${sanitizeForLog(err.message)}`);
      }
      res.status(err.status).json({ error: err.message });
      return;
    }

    // body-parser marks malformed JSON with a 4xx status
    const status = statusOf(err);
    if (status !== undefined && status >= 400 && status < 500) {
      res.status(status).json({ error: 'Invalid request body' });
      return;
    }

    console.error('Error:', err);

    res.status(500).json({
      error: options.isDevelopment && err instanceof Error ? err.message : 'Internal server error'
    });
  };
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    console.log(`${req.method} ${req.path} - ${res.statusCode} - ${duration}ms`);
  });

  next();
}
