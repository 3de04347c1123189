import { Response } from 'express';

/**
 * Response envelope shared by every API route
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: {
    code?: string;
    details?: unknown;
  };
  meta?: Record<string, unknown>;
}

export class ResponseHandler {
  static success<T>(
    res: Response,
    data?: T,
    message: string = 'Success',
    statusCode: number = 200,
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse<T> = {
      success: true,
      message,
      data,
      ...(meta && { meta }),
    };

    return res.status(statusCode).json(response);
  }

  /**
   * Created Response (201)
   */
  static created<T>(
    res: Response,
    data?: T,
    message: string = 'Created',
    meta?: Record<string, unknown>
  ): Response {
    return this.success(res, data, message, 201, meta);
  }

  /**
   * List with skip/limit window echoed back in `meta`
   */
  static list<T>(
    res: Response,
    data: T[],
    window: { skip: number; limit: number },
    message: string = 'Success'
  ): Response {
    return this.success(res, data, message, 200, { ...window, count: data.length });
  }

  static error(
    res: Response,
    message: string = 'Something went wrong',
    statusCode: number = 400,
    error?: {
      code?: string;
      details?: unknown;
    }
  ): Response {
    const response: ApiResponse = {
      success: false,
      message,
      error,
    };

    return res.status(statusCode).json(response);
  }

  static validationError(
    res: Response,
    details: unknown,
    message: string = 'Invalid data'
  ): Response {
    return this.error(res, message, 422, {
      code: 'VALIDATION_ERROR',
      details,
    });
  }

  static notFound(
    res: Response,
    message: string = 'Not found'
  ): Response {
    return this.error(res, message, 404, {
      code: 'NOT_FOUND',
    });
  }

  static conflict(
    res: Response,
    message: string = 'Resource already exists',
    details?: unknown
  ): Response {
    return this.error(res, message, 409, {
      code: 'CONFLICT',
      details,
    });
  }
}
