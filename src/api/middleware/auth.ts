import type { Request, Response, NextFunction } from 'express';
import { UnauthorizedError } from './errorHandler.js';

/**
 * API key validation middleware
 */
export function validateApiKey(validApiKeys: readonly string[]) {
  return (req: Request, res: Response, next: NextFunction): void => {
    // Get API key from header
    const apiKey = req.get('X-API-Key') || req.get('Authorization')?.replace('Bearer ', '');

    if (!apiKey) {
      throw new UnauthorizedError('API key required. Provide it in X-API-Key header or Authorization header as Bearer token.');
    }

    if (!validApiKeys.includes(apiKey)) {
      throw new UnauthorizedError('Invalid API key');
    }

    res.locals.apiKey = apiKey;
    next();
  };
}
