import type { Request, Response, NextFunction } from 'express';
import { logger } from '../../utils/logger.js';

/**
 * Request logging middleware
 * Skips logging for health check endpoints to reduce log noise
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  // Skip logging for health check endpoints
  const skipPaths = ['/health'];
  if (skipPaths.some(path => req.url === path || req.url.startsWith(path + '?'))) {
    return next();
  }

  const startTime = Date.now();

  logger.info('API Request', {
    method: req.method,
    url: req.originalUrl,
    userAgent: req.get('User-Agent'),
    ip: req.ip,
    timestamp: new Date().toISOString()
  });

  res.on('finish', () => {
    const duration = Date.now() - startTime;

    logger.info('API Response', {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      duration: `${duration}ms`,
      contentLength: res.get('Content-Length') || 0,
      timestamp: new Date().toISOString()
    });
  });

  next();
}
