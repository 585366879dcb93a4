import { Request, Response, NextFunction, RequestHandler } from 'express';
import { loggers } from '../utils/logger';

/**
 * Standardized Error Handling
 *
 * Error taxonomy shared by the engine and the control API.
 */

// Error types
export enum ErrorType {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  TRANSIENT_IO_ERROR = 'TRANSIENT_IO_ERROR',
  DATA_INSUFFICIENT_ERROR = 'DATA_INSUFFICIENT_ERROR',
  EXECUTION_ERROR = 'EXECUTION_ERROR',
  SUPERVISOR_EXHAUSTED_ERROR = 'SUPERVISOR_EXHAUSTED_ERROR',
  NOT_FOUND_ERROR = 'NOT_FOUND_ERROR',
  CONFLICT_ERROR = 'CONFLICT_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// Custom error class
export class AppError extends Error {
  public readonly type: ErrorType;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    type: ErrorType = ErrorType.INTERNAL_ERROR,
    statusCode: number = 500,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;

    this.type = type;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this);
  }
}

/** Missing or invalid configuration; fatal at startup */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorType.VALIDATION_ERROR, 400, true, details);
  }
}

/** Collaborator hiccup; retried on the next tick */
export class TransientIOError extends AppError {
  constructor(service: string, message: string, details?: Record<string, unknown>) {
    super(`${service}: ${message}`, ErrorType.TRANSIENT_IO_ERROR, 502, true, details);
  }
}

/** Not enough candle history to analyse an instrument */
export class DataInsufficientError extends AppError {
  constructor(instrument: string, bars: number, required: number) {
    super(
      `${instrument} has ${bars} completed bars, ${required} required`,
      ErrorType.DATA_INSUFFICIENT_ERROR,
      422,
      true,
      { instrument, bars, required }
    );
  }
}

/** Order rejected by the execution service */
export class ExecutionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorType.EXECUTION_ERROR, 502, true, details);
  }
}

/** Loop failure budget exceeded */
export class SupervisorExhaustedError extends AppError {
  constructor(failures: number, cause?: unknown) {
    super(
      `Trading loop failed ${failures} times in a row`,
      ErrorType.SUPERVISOR_EXHAUSTED_ERROR,
      503,
      true,
      { failures, cause: cause instanceof Error ? cause.message : undefined }
    );
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, ErrorType.NOT_FOUND_ERROR, 404, true);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, ErrorType.CONFLICT_ERROR, 409, true);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// Error response formatter
interface ErrorResponse {
  success: false;
  error: {
    type: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: string;
    path?: string;
  };
}

function formatErrorResponse(error: AppError, req: Request): ErrorResponse {
  return {
    success: false,
    error: {
      type: error.type,
      message: error.message,
      details: error.details,
      timestamp: new Date().toISOString(),
      path: req.path,
    },
  };
}

// Global error handler middleware
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  let appError: AppError;

  if (err instanceof AppError) {
    appError = err;
  } else {
    loggers.app.error('Unexpected error', err);

    appError = new AppError(
      process.env.NODE_ENV === 'production' ? 'An unexpected error occurred' : err.message,
      ErrorType.INTERNAL_ERROR,
      500,
      false
    );
  }

  if (appError.isOperational && appError.statusCode < 500) {
    loggers.app.warn(`${appError.type}: ${appError.message}`);
  } else {
    loggers.app.error(`${appError.type}: ${appError.message}`, undefined, appError.details);
  }

  res.status(appError.statusCode).json(formatErrorResponse(appError, req));
}

// Async handler wrapper to catch promise rejections
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

// 404 handler
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path}`));
}
