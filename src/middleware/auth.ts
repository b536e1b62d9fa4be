import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger } from '../utils/logger';
import { AppError } from '../utils/errors';

// Extend Express Request type to include apiKey
declare global {
  namespace Express {
    interface Request {
      apiKey?: string;
      requestId?: string;
    }
  }
}

/**
 * Request ID Middleware
 * Generates unique ID for each request for tracking
 */
export const assignRequestId = (req: Request, res: Response, next: NextFunction): void => {
  const incoming = req.header('x-request-id');
  req.requestId = incoming && /^[\w-]{1,64}$/.test(incoming) ? incoming : generateRequestId();
  res.setHeader('X-Request-ID', req.requestId);
  next();
};

/**
 * API Key Authentication Middleware
 * Validates X-API-Key header against configured API keys
 */
export const apiKeyAuth = (req: Request, res: Response, next: NextFunction): void => {
  try {
    const apiKey = req.header('x-api-key');

    if (!apiKey) {
      logger.warn(`Authentication failed: No API key provided - ${req.requestId}`, {
        ip: req.ip,
        path: req.path,
      });

      throw new AppError(
        'API key is required. Please provide X-API-Key header.',
        401,
        'MISSING_API_KEY'
      );
    }

    const validKeys = [...config.API_KEYS, config.MASTER_API_KEY];

    if (!validKeys.includes(apiKey)) {
      logger.warn(`Authentication failed: Invalid API key - ${req.requestId}`, {
        ip: req.ip,
        path: req.path,
        apiKeyPrefix: maskApiKey(apiKey),
      });

      throw new AppError(
        'Invalid API key. Please check your credentials.',
        401,
        'INVALID_API_KEY'
      );
    }

    req.apiKey = apiKey;

    logger.debug(`Authentication successful - ${req.requestId}`, {
      ip: req.ip,
      path: req.path,
      apiKeyPrefix: maskApiKey(apiKey),
    });

    next();
  } catch (error) {
    next(error);
  }
};

function maskApiKey(apiKey: string): string {
  return apiKey.substring(0, 4) + '...';
}

/**
 * Generate unique request ID for tracing
 */
function generateRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}
