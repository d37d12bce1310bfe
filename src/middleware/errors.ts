/**
 * Error handling middleware
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ValidationError } from '../analytics/errors';
import type { ServiceLogger } from '../utils/logger';

/**
 * body-parser marks malformed JSON bodies with this type
 */
function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function createErrorHandler(logger: ServiceLogger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }

    if (isBodyParseError(err)) {
      return res.status(400).json({ error: 'Invalid JSON' });
    }

    if (err instanceof ValidationError) {
      return res.status(400).json({ error: err.message });
    }

    logger.error('Unhandled error', {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
      path: req.path,
      method: req.method,
    });

    return res.status(500).json({ error: 'Internal server error' });
  };
}

export function notFound(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Route not found' });
}
