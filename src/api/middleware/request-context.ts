// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST CONTEXT — Request Ids and Access Logging
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

import { logRequest } from '../../logging/index.js';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      userId?: string;
    }
  }
}

export const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * Reuse an incoming request id when the caller sent one.
 */
export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.get(REQUEST_ID_HEADER);
  const requestId = incoming && incoming.length <= 128 ? incoming : uuidv4();
  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  const startTime = Date.now();
  res.on('finish', () => {
    logRequest({
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: Date.now() - startTime,
      requestId,
      // Route params are gone by the time the response finishes
      userId: req.userId,
      userAgent: req.get('User-Agent'),
    });
  });

  next();
}

/**
 * `router.param` handler that remembers the route's user id for the access log.
 */
export function captureUserId(req: Request, _res: Response, next: NextFunction, userId: unknown): void {
  if (typeof userId === 'string') {
    req.userId = userId;
  }
  next();
}
