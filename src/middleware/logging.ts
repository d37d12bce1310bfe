/**
 * Request logging middleware
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ServiceLogger } from '../utils/logger';

export function createRequestLogger(logger: ServiceLogger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      const logMessage = `${req.method} ${req.path}`;
      const context = {
        statusCode: res.statusCode,
        duration: `${duration}ms`,
        ip: req.ip,
        userAgent: req.get('user-agent'),
      };

      if (res.statusCode >= 500) {
        logger.error(logMessage, context);
      } else if (res.statusCode >= 400) {
        logger.warn(logMessage, context);
      } else {
        logger.info(logMessage, context);
      }
    });

    next();
  };
}
