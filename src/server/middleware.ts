/**
 * @fileoverview Express middleware for the print API: request logging, unknown route
 * handling and the terminal error handler.
 */

import type { NextFunction, Request, Response } from 'express';
import { ErrorCode } from '../utils/error.utils';
import { logError, logVerbose } from '../utils/logging';
import type { StandardAPIResponse } from './types/api.types';

/**
 * Request logging middleware
 */
export function createRequestLogger() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logVerbose('API', `${req.method} ${req.originalUrl} - ${res.statusCode} (${duration}ms)`);
    });

    next();
  };
}

/**
 * JSON 404 for API paths no route matched
 */
export function createNotFoundHandler() {
  return (req: Request, res: Response): void => {
    const response: StandardAPIResponse = {
      success: false,
      error: `API endpoint not found: ${req.method} ${req.originalUrl}`,
      errorCode: ErrorCode.NOT_FOUND
    };
    res.status(404).json(response);
  };
}

/**
 * Error handling middleware
 */
export function createErrorMiddleware() {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    logError('API', 'Express error:', err);

    // Malformed JSON bodies are reported by express.json() with a 400 status
    const status = typeof err === 'object' && err !== null && Reflect.get(err, 'status') === 400 ? 400 : 500;
    const response: StandardAPIResponse = {
      success: false,
      error: status === 400 ? 'Malformed request body' : 'Internal server error',
      errorCode: status === 400 ? ErrorCode.VALIDATION : ErrorCode.UNKNOWN
    };

    res.status(status).json(response);
  };
}
