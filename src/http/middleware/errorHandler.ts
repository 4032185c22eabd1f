// src/http/middleware/errorHandler.ts

/**
 * Global error handler
 *
 * - DTO validation errors and unparsable JSON bodies -> HTTP 400
 * - Unknown trajectory ids -> HTTP 404
 * - Anything else -> HTTP 500 with a generic message; details stay in the server log
 * - Always returns the standard error envelope with the correlationId
 */

import type { NextFunction, Request, Response } from 'express';
import { buildErrorEnvelope } from '../errors/errorEnvelope';
import '../requestContext';

import { CoverageDtoValidationError } from '../../coverage/dto/CoverageDtoValidationError';
import { TrajectoryNotFoundError } from '../../coverage/domain/TrajectoryNotFoundError';
import { logger } from '../../shared/logging/Logger';

/**
 * express.json() reports unparsable bodies as a SyntaxError tagged with type "entity.parse.failed".
 */
function isBodyParseError(err: unknown): err is SyntaxError {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): Response {
  if (err instanceof CoverageDtoValidationError) {
    logger.debug({ correlationId: req.correlationId, issues: err.issues }, 'Validation failed');

    return res.status(400).json(
      buildErrorEnvelope({
        code: 'VALIDATION_ERROR',
        message: err.message,
        correlationId: req.correlationId,
        issues: err.issues,
      }),
    );
  }

  if (isBodyParseError(err)) {
    logger.debug({ correlationId: req.correlationId }, 'Request body is not valid JSON');

    return res.status(400).json(
      buildErrorEnvelope({
        code: 'VALIDATION_ERROR',
        message: 'Malformed JSON body',
        correlationId: req.correlationId,
        issues: ['Body must be valid JSON.'],
      }),
    );
  }

  if (err instanceof TrajectoryNotFoundError) {
    return res.status(404).json(
      buildErrorEnvelope({
        code: 'TRAJECTORY_NOT_FOUND',
        message: err.message,
        correlationId: req.correlationId,
      }),
    );
  }

  logger.error({ correlationId: req.correlationId, err }, 'Unhandled error in request pipeline');

  return res.status(500).json(
    buildErrorEnvelope({
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred.',
      correlationId: req.correlationId,
    }),
  );
}
