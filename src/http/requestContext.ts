// src/http/requestContext.ts

/**
 * Request-scoped fields added by our middleware (module augmentation).
 * Import this module wherever `req.correlationId` is read or written.
 */

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

export const CORRELATION_ID_HEADER = 'x-correlation-id';
export const PROCESS_TIME_HEADER = 'x-process-time';
