import { Response } from 'express';
import {
  ConflictError, NotFoundError, RequestValidationError, StorageUnavailableError
} from '../models/errors';

/**
 * Map an error to its HTTP response. Unknown errors become a generic 500.
 */
export function sendError(res: Response, error: unknown, failureMessage: string): void {
  if (error instanceof RequestValidationError) {
    res.status(400).json({
      error: 'Validation error',
      message: error.message,
      details: error.details
    });
    return;
  }

  if (error instanceof NotFoundError) {
    res.status(404).json({ error: 'Not Found', message: error.message });
    return;
  }

  if (error instanceof ConflictError) {
    res.status(409).json({ error: 'Conflict', message: error.message });
    return;
  }

  console.error(`[API] ❌ ${failureMessage}:`, error);

  if (error instanceof StorageUnavailableError) {
    res.status(503).json({ error: 'Storage unavailable', message: failureMessage });
    return;
  }

  res.status(500).json({
    error: 'Internal server error',
    message: failureMessage
  });
}
