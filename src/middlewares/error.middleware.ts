import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';
import { toFieldErrors } from '../utils/validation';

const hasCode = (err: unknown): err is { code: string } =>
  typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';

// body-parser and other http-errors style failures carry their own 4xx status
const clientStatusOf = (err: unknown): number | null => {
  if (typeof err !== 'object' || err === null) {
    return null;
  }
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  next: NextFunction
) => {
  const context = {
    url: req.originalUrl,
    method: req.method,
    params: req.params,
    query: req.query,
  };

  if (err instanceof ZodError) {
    logger.warn('[Validation Error]', { ...context, issues: err.issues.length });
    return ResponseHandler.validationError(res, toFieldErrors(err));
  }

  if (err instanceof AppError) {
    logger.warn(`[${err.name}] ${err.message}`, context);
    return ResponseHandler.error(res, err.message, err.statusCode, {
      code: err.code,
      details: err.details,
    });
  }

  // Database errors
  if (hasCode(err)) {
    if (err.code === '23505') { // Unique violation
      return ResponseHandler.conflict(res, 'Resource already exists');
    }

    if (err.code === '23503') { // Foreign key violation
      return ResponseHandler.error(res, 'Referenced resource does not exist', 409, {
        code: 'FOREIGN_KEY_VIOLATION',
      });
    }

    if (err.code === '23514') { // Check violation
      return ResponseHandler.validationError(res, [], 'Value violates a constraint');
    }

    if (err.code === '22003') { // Numeric value out of range
      return ResponseHandler.validationError(res, [], 'Value out of range');
    }
  }

  const clientStatus = clientStatusOf(err);
  if (clientStatus !== null) {
    logger.warn('[Bad Request]', context);
    return ResponseHandler.error(res, err instanceof Error ? err.message : 'Bad request', clientStatus, {
      code: 'BAD_REQUEST',
    });
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logger.error('[Error Handler]', { ...context, message: error.message, stack: error.stack });

  return ResponseHandler.error(res, 'Internal server error', 500, {
    code: 'INTERNAL_ERROR',
    details: appConfig.nodeEnv === 'development' ? error.stack : undefined,
  });
};

export const notFoundHandler = (req: Request, res: Response) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
