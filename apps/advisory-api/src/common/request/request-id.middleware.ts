// Import Express middleware types
import type { NextFunction, Request, Response } from 'express';
// Import Node.js crypto module for UUID generation
import { randomUUID } from 'node:crypto';
// Request augmentation (requestId)
import '../../types/express-request';

// Upper bound for client-supplied ids, keeps log lines bounded
const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Request ID middleware - Assigns a unique identifier to each HTTP request
 *
 * Behavior:
 * - If the client sends a usable 'x-request-id' header, reuse it (cross-service tracing)
 * - Otherwise generate a new UUID v4
 * - Attach it to req.requestId and echo it back in the 'x-request-id' response header
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.header('x-request-id')?.trim();
  const requestId =
    incoming && incoming.length > 0 && incoming.length <= MAX_REQUEST_ID_LENGTH ? incoming : randomUUID();
  req.requestId = requestId;
  res.setHeader('x-request-id', requestId);
  next();
}
