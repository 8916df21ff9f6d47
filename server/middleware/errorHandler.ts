import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../utils/logger';

export type FieldErrors = Record<string, string[]>;

export const NON_FIELD_ERRORS = 'non_field_errors';

// Custom error class for application errors
export class ApplicationError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(message: string, statusCode = 500, isOperational = true, code = 'INTERNAL_ERROR') {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.code = code;

    Error.captureStackTrace(this, this.constructor);
  }
}

// Field-keyed validation failure
export class ValidationError extends ApplicationError {
  public readonly fields: FieldErrors;

  constructor(fields: FieldErrors, message = 'Validation failed') {
    super(message, 400, true, 'VALIDATION_ERROR');
    this.fields = fields;
  }

  static forField(field: string, message: string): ValidationError {
    return new ValidationError({ [field]: [message] });
  }

  static nonField(message: string): ValidationError {
    return new ValidationError({ [NON_FIELD_ERRORS]: [message] });
  }
}

export class AuthenticationError extends ApplicationError {
  constructor(message = 'Authentication required', code = 'AUTHENTICATION_ERROR') {
    super(message, 401, true, code);
  }
}

export class NotFoundError extends ApplicationError {
  constructor(resource = 'Resource') {
    super(`${resource} not found`, 404, true, 'NOT_FOUND');
  }
}

export class ConflictError extends ApplicationError {
  constructor(message: string) {
    super(message, 409, true, 'CONFLICT');
  }
}

export class RateLimitError extends ApplicationError {
  constructor(message = 'Too many requests') {
    super(message, 429, true, 'RATE_LIMIT_EXCEEDED');
  }
}

// Async error wrapper for route handlers
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

function toApplicationError(err: unknown): ApplicationError {
  if (err instanceof ApplicationError) return err;

  // body-parser marks malformed JSON with a status and type
  if (err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed') {
    return ValidationError.nonField('Malformed JSON body');
  }

  const message = err instanceof Error ? err.message : String(err);
  return new ApplicationError(message, 500, false);
}

// Main error handling middleware
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const appError = toApplicationError(err);

  if (appError.statusCode >= 500) {
    logger.error(`Error handling request: ${req.method} ${req.originalUrl}`, err);
  } else {
    logger.warn(`Client error: ${req.method} ${req.originalUrl}`, {
      error: appError.message,
      statusCode: appError.statusCode,
      code: appError.code,
      userId: req.user?.id,
      ip: req.ip
    });
  }

  if (appError.statusCode === 401) {
    logger.security('ACCESS_DENIED', {
      method: req.method,
      path: req.originalUrl,
      ip: req.ip,
      userAgent: req.headers['user-agent'],
      error: appError.message,
    });
  }

  if (appError instanceof ValidationError) {
    res.status(appError.statusCode).json({
      message: appError.message,
      errors: appError.fields,
    });
    return;
  }

  // Stack traces stay in the server log
  res.status(appError.statusCode).json({
    error: {
      message: appError.isOperational ? appError.message : 'Internal server error',
      code: appError.code,
      statusCode: appError.statusCode
    }
  });
}

// 404 handler
export function notFoundHandler(_req: Request, res: Response) {
  const error = new NotFoundError('Endpoint');
  res.status(error.statusCode).json({
    error: {
      message: error.message,
      code: error.code,
      statusCode: error.statusCode
    }
  });
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// Filesystem fault translation
export function handleFilesystemError(error: unknown, resource: string): ApplicationError {
  switch (errnoCode(error)) {
    case 'EEXIST':
    case 'ENOTEMPTY':
      return new ConflictError(`${resource} already exists`);
    case 'ENOENT':
      return new NotFoundError(resource);
    default:
      return new ApplicationError(`${resource} operation failed`, 500, false);
  }
}

// Database error handler
export function handleDatabaseError(error: unknown): ApplicationError {
  if (error instanceof ApplicationError) return error;

  const code = errnoCode(error);
  if (code === '23505') {
    // Unique constraint violation
    return new ConflictError('A record with this value already exists');
  }
  if (code === '23503') {
    return ValidationError.nonField('Referenced record does not exist');
  }
  if (code === '22P02') {
    return ValidationError.nonField('Invalid input format');
  }
  if (code === '22003') {
    return ValidationError.nonField('Value out of range');
  }
  if (code === '22001') {
    return ValidationError.nonField('Value too long');
  }

  return new ApplicationError('Database operation failed', 500, false);
}

export function isErrnoCode(error: unknown, code: string): boolean {
  return errnoCode(error) === code;
}
