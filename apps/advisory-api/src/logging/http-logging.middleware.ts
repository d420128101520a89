import type { NextFunction, Request, Response } from 'express';
import { JsonLogger } from './json-logger.service';
import '../types/express-request';

function safePath(req: Request): string {
  // Avoid logging query strings with secrets. Keep just the path.
  return (req.originalUrl ?? req.url ?? '').split('?')[0] ?? '';
}

/**
 * Request/response log line per request (no headers or bodies).
 * Runs after requestIdMiddleware so the id is already on the request.
 */
export function createHttpLoggingMiddleware(logger: JsonLogger) {
  return function httpLoggingMiddleware(req: Request, res: Response, next: NextFunction) {
    const start = process.hrtime.bigint();

    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;

      const meta: Record<string, unknown> = {
        requestId: req.requestId,
        method: req.method,
        path: safePath(req),
        statusCode: res.statusCode,
        durationMs: Math.round(durationMs * 10) / 10
      };

      if (req.user) meta.userId = req.user.userId;
      if (req.principal) meta.userRole = req.principal.role;

      // Keep noise down: log 5xx as error, 4xx as warn, otherwise info.
      if (res.statusCode >= 500) {
        logger.error('HTTP request failed', meta);
      } else if (res.statusCode >= 400) {
        logger.warn('HTTP request client error', meta);
      } else {
        logger.log('HTTP request', meta);
      }
    });

    next();
  };
}
