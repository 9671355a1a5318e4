import { Request, Response, NextFunction } from 'express';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { ApiError } from '../../utils/errors.js';

/**
 * REST API Error Response Format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    field?: string;
  };
}

/**
 * Renders ApiError as-is and anything else as a 500.
 * Errors from libraries should be converted to ApiError where they are raised.
 */
export function errorMiddleware(
  error: unknown,
  req: Request,
  res: Response<ErrorResponse>,
  _next: NextFunction
): void {
  if (error instanceof ApiError) {
    const level = error.statusCode >= 500 ? 'error' : 'debug';
    logger[level]({ err: error, method: req.method, path: req.path }, 'Request rejected');

    res.status(error.statusCode).json({
      error: {
        code: error.code ?? 'ERROR',
        message: error.message,
        field: error.field,
      },
    });
    return;
  }

  // express.json() reports malformed bodies with a status of 400
  if (error instanceof SyntaxError && 'status' in error && error.status === 400) {
    res.status(400).json({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Malformed JSON body',
      },
    });
    return;
  }

  logger.error(
    {
      err: error,
      method: req.method,
      path: req.path,
      query: req.query,
      body: req.body,
    },
    'Request error'
  );

  // In production, hide error details
  const message =
    config.nodeEnv === 'production'
      ? 'Internal server error'
      : error instanceof Error
        ? error.message
        : 'Unknown error';

  res.status(500).json({
    error: {
      code: 'INTERNAL_ERROR',
      message,
    },
  });
}
