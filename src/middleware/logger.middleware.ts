import { Request, Response, NextFunction } from 'express';
import { componentLogger } from '../config/logger';

const log = componentLogger('http');

/**
 * Request logging middleware
 *
 * One line per request on arrival, one per response with status and duration
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();

  log.debug('Incoming request', {
    method: req.method,
    path: req.path,
    query: req.query,
    ip: req.ip,
  });

  res.on('finish', () => {
    const duration = Date.now() - startTime;

    log.info('Outgoing response', {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: `${duration}ms`,
    });
  });

  next();
};
