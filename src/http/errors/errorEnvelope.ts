// src/http/errors/errorEnvelope.ts

/**
 * Standard error envelope
 *
 * Every error response uses this structure so clients can parse failures uniformly.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'TRAJECTORY_NOT_FOUND'
  | 'NOT_FOUND'
  | 'INTERNAL_SERVER_ERROR';

export type ErrorEnvelope = {
  error: {
    code: ErrorCode;
    message: string;
    correlationId?: string;
    issues?: string[];
  };
};

export function buildErrorEnvelope(params: {
  code: ErrorCode;
  message: string;
  correlationId?: string;
  issues?: string[];
}): ErrorEnvelope {
  return {
    error: {
      code: params.code,
      message: params.message,
      ...(params.correlationId ? { correlationId: params.correlationId } : {}),
      ...(params.issues ? { issues: params.issues } : {}),
    },
  };
}
