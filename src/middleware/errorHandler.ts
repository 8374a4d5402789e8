import { Request, Response, NextFunction } from 'express';
import { ErrorResponse } from '../types';
import { createLogger } from '../utils/logger';

const log = createLogger('HTTP');

/**
 * body-parser tags its errors with a `type` such as 'entity.parse.failed'
 */
function bodyParserErrorType(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('type' in error)) {
    return undefined;
  }
  return typeof error.type === 'string' ? error.type : undefined;
}

export function notFoundHandler(req: Request, res: Response): void {
  const errorResponse: ErrorResponse = {
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: `No route for ${req.method} ${req.path}`,
    },
  };
  res.status(404).json(errorResponse);
}

export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  const type = bodyParserErrorType(error);
  if (type === 'entity.parse.failed') {
    const errorResponse: ErrorResponse = {
      success: false,
      error: {
        code: 'INVALID_REQUEST',
        kind: 'validation',
        message: 'Request body is not valid JSON',
        field: 'body',
      },
    };
    res.status(400).json(errorResponse);
    return;
  }
  if (type === 'entity.too.large') {
    const errorResponse: ErrorResponse = {
      success: false,
      error: {
        code: 'PAYLOAD_TOO_LARGE',
        kind: 'validation',
        message: 'Request body is too large',
        field: 'body',
      },
    };
    res.status(413).json(errorResponse);
    return;
  }

  log.error(`Unhandled error on ${req.method} ${req.path}`, error);
  const errorResponse: ErrorResponse = {
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    },
  };
  res.status(500).json(errorResponse);
}
