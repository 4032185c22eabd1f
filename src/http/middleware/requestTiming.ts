// src/http/middleware/requestTiming.ts

/**
 * Request timing middleware
 *
 * Measures how long each request takes, reports it in the x-process-time
 * response header (seconds) and logs one line per handled request.
 */

import type { NextFunction, Request, Response } from 'express';

import { PROCESS_TIME_HEADER } from '../requestContext';
import { logger } from '../../shared/logging/Logger';

function elapsedSeconds(startedAt: bigint): number {
  return Number(process.hrtime.bigint() - startedAt) / 1e9;
}

export function requestTimingMiddleware(req: Request, res: Response, next: NextFunction): void {
  const startedAt = process.hrtime.bigint();

  // every response of this service is JSON, so stamp the header just before it is sent
  const json = res.json.bind(res);
  res.json = (body?: unknown) => {
    if (!res.headersSent) {
      res.setHeader(PROCESS_TIME_HEADER, elapsedSeconds(startedAt).toFixed(4));
    }
    return json(body);
  };

  res.on('finish', () => {
    logger.info(
      {
        correlationId: req.correlationId,
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        processTimeSeconds: Number(elapsedSeconds(startedAt).toFixed(4)),
      },
      'Request handled',
    );
  });

  next();
}
