import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { AppError, EngineError, EngineErrorKind, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

interface ErrorBody {
  status: 'error';
  error: {
    code: string;
    message: string;
    statusCode: number;
    requestId?: string;
    timestamp: string;
    details?: Record<string, unknown>;
    stack?: string;
  };
}

const ENGINE_ERROR_RESPONSES: Record<EngineErrorKind, { statusCode: number; code: string }> = {
  UnsupportedFormat: { statusCode: 400, code: 'UNSUPPORTED_FORMAT' },
  UnsupportedLanguage: { statusCode: 400, code: 'UNSUPPORTED_LANGUAGE' },
  CorruptAudio: { statusCode: 422, code: 'CORRUPT_AUDIO' },
  EmptyAudio: { statusCode: 422, code: 'EMPTY_AUDIO' },
};

/**
 * Global Error Handler Middleware
 */
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  // Express identifies error handlers by arity
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction
): void => {
  let statusCode = 500;
  let code = 'INTERNAL_ERROR';
  let message = 'An unexpected error occurred';
  let details: Record<string, unknown> | undefined;

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    code = err.code;
    message = err.message;

    if (err instanceof ValidationError) {
      details = err.details;
    }
  } else if (err instanceof EngineError) {
    ({ statusCode, code } = ENGINE_ERROR_RESPONSES[err.kind]);
    message = err.message;
  }
  // Malformed JSON from body-parser
  else if (err instanceof SyntaxError && 'body' in err) {
    statusCode = 400;
    code = 'INVALID_JSON';
    message = 'Invalid JSON in request body';
  }
  // body-parser size limit
  else if ('type' in err && err.type === 'entity.too.large') {
    statusCode = 413;
    code = 'PAYLOAD_TOO_LARGE';
    message = 'Request body exceeds the size limit';
  }

  if (statusCode >= 500) {
    logger.error('Server error:', {
      requestId: req.requestId,
      error: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
      ip: req.ip,
    });
  } else {
    logger.warn('Client error:', {
      requestId: req.requestId,
      error: err.message,
      code,
      path: req.path,
      method: req.method,
      ip: req.ip,
    });
  }

  const errorResponse: ErrorBody = {
    status: 'error',
    error: {
      code,
      message,
      statusCode,
      requestId: req.requestId,
      timestamp: new Date().toISOString(),
    },
  };

  if (details) {
    errorResponse.error.details = details;
  }

  if (config.NODE_ENV === 'development') {
    errorResponse.error.stack = err.stack;
  }

  res.status(statusCode).json(errorResponse);
};

/**
 * Async error wrapper for route handlers
 * Catches async errors and passes them to error handler
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

/**
 * 404 Not Found handler
 */
export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    status: 'error',
    error: {
      code: 'NOT_FOUND',
      message: `Cannot ${req.method} ${req.path}`,
      statusCode: 404,
      requestId: req.requestId,
      timestamp: new Date().toISOString(),
    },
  });
};
