import { Request, Response, NextFunction, RequestHandler } from 'express';
import { componentLogger } from '../config/logger';

const log = componentLogger('http');

// Custom error class for API errors
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown, code = 'ERROR') {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

interface ErrorBody {
  success: false;
  error: {
    message: string;
    code: string;
    timestamp: string;
    details?: unknown;
  };
}

function statusOf(error: unknown): number {
  if (error instanceof ApiError) {
    return error.statusCode;
  }
  // body-parser errors carry an HTTP status
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}

function errorBody(error: unknown, statusCode: number): ErrorBody {
  const isApi = error instanceof ApiError;
  return {
    success: false,
    error: {
      message: statusCode >= 500
        ? 'Internal Server Error'
        : error instanceof Error ? error.message : 'Request failed',
      code: isApi ? error.code : statusCode >= 500 ? 'INTERNAL_ERROR' : 'BAD_REQUEST',
      timestamp: new Date().toISOString(),
      ...(isApi && error.details !== undefined ? { details: error.details } : {})
    }
  };
}

// Main error handler middleware
export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const statusCode = statusOf(error);

  if (statusCode >= 500) {
    log.error('Unexpected error occurred', {
      method: req.method,
      path: req.path,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined
    });
  } else {
    log.warn('Request rejected', {
      method: req.method,
      path: req.path,
      statusCode,
      error: error instanceof Error ? error.message : String(error)
    });
  }

  res.status(statusCode).json(errorBody(error, statusCode));
};

// Async error wrapper for route handlers
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};

// 404 Not Found handler
export const notFoundHandler = (req: Request, res: Response): void => {
  const error = new ApiError(404, `Cannot ${req.method} ${req.path}`, undefined, 'NOT_FOUND');
  res.status(404).json(errorBody(error, 404));
};
