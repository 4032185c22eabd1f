// src/http/middleware/correlationId.ts

/**
 * Correlation ID middleware
 *
 * Ensures every request has a correlationId for cross-service tracing:
 * the x-correlation-id header when present, otherwise a generated UUID.
 * The id is exposed as req.correlationId and echoed in the response header.
 */

import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';

import { CORRELATION_ID_HEADER } from '../requestContext';

export function correlationIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const headerId = req.header(CORRELATION_ID_HEADER);

  const correlationId =
    typeof headerId === 'string' && headerId.trim().length > 0 ? headerId : randomUUID();

  req.correlationId = correlationId;
  res.setHeader(CORRELATION_ID_HEADER, correlationId);

  next();
}
