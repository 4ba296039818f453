import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { ApiResponse } from '../types';
import { AppError, errorMessage } from '../types/errors';
import { logger } from '../utils/logger';

const isBodyParseError = (error: unknown): boolean =>
  error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';

/**
 * 🌐 Centralized error-handling middleware
 * Maps AppError to its status and `{ success: false, code, message }`.
 */
export const errorHandler: ErrorRequestHandler = (
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
) => {
  /** 1️⃣ Operational errors */
  if (error instanceof AppError) {
    const log = error.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(`❌ ${error.name} on ${req.method} ${req.originalUrl}: ${error.message}`);

    res.status(error.statusCode).json({
      success: false,
      code: error.code,
      message: error.message,
    } satisfies ApiResponse);
    return;
  }

  /** 2️⃣ Schema validation */
  if (error instanceof ZodError) {
    res.status(400).json({
      success: false,
      code: 'VALIDATION_ERROR',
      message: 'Validation error',
      errors: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    } satisfies ApiResponse);
    return;
  }

  /** 3️⃣ Malformed JSON body */
  if (isBodyParseError(error)) {
    res.status(400).json({ success: false, code: 'MALFORMED_BODY', message: 'Request body is not valid JSON' } satisfies ApiResponse);
    return;
  }

  /** 4️⃣ Fallback: unhandled errors */
  logger.error(`💥 Unhandled error on ${req.method} ${req.originalUrl}:`, error);
  res.status(500).json({
    success: false,
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
    ...(process.env.NODE_ENV === 'development' && { error: errorMessage(error) }),
  } satisfies ApiResponse);
};

/**
 * 🕳️ 404 for anything no router claimed.
 */
export const notFoundHandler = (_req: Request, res: Response): void => {
  res.status(404).json({ success: false, code: 'ROUTE_NOT_FOUND', message: 'Route not found' } satisfies ApiResponse);
};
