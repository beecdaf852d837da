import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * CORS with an explicit origin allowlist.
 *
 * - never '*' together with credentials
 * - the 'null' origin (sandboxed iframes, file:// pages) is refused
 * - Vary: Origin on every response so caches keep origins apart
 */

const ALLOWED_METHODS = ['GET', 'POST', 'OPTIONS'];
const EXPOSED_HEADERS = ['X-Request-Id', 'X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset'];
const PREFLIGHT_MAX_AGE = 86400; // 24 hours

export interface CorsOptions {
  allowedOrigins: readonly string[];
  apiKeyHeader: string;
}

export function createCorsMiddleware(options: CorsOptions): RequestHandler {
  const allowedOrigins = new Set(options.allowedOrigins);
  const allowedHeaders = ['Content-Type', 'Authorization', 'X-Requested-With', 'X-Request-Id', options.apiKeyHeader];

  return (req: Request, res: Response, next: NextFunction): void => {
    const origin = req.headers.origin;

    res.setHeader('Vary', 'Origin');

    // Same-origin or non-browser client
    if (!origin) {
      next();
      return;
    }

    if (origin === 'null') {
      res.status(403).json({ error: 'FORBIDDEN', message: 'Null origin not allowed' });
      return;
    }

    if (!allowedOrigins.has(origin)) {
      if (req.method === 'OPTIONS') {
        res.status(403).json({ error: 'FORBIDDEN', message: 'Origin not allowed' });
        return;
      }
      // Without CORS headers the browser blocks the response itself
      next();
      return;
    }

    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Access-Control-Allow-Credentials', 'true');
    res.setHeader('Access-Control-Allow-Methods', ALLOWED_METHODS.join(', '));
    res.setHeader('Access-Control-Allow-Headers', allowedHeaders.join(', '));
    res.setHeader('Access-Control-Expose-Headers', EXPOSED_HEADERS.join(', '));

    if (req.method === 'OPTIONS') {
      res.setHeader('Access-Control-Max-Age', String(PREFLIGHT_MAX_AGE));
      res.status(204).end();
      return;
    }

    next();
  };
}
