import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { logger } from '../utils/logger.js';
import { AppError, BadRequestError, NotFoundError, isAppError } from '../utils/errors.js';

const REQUEST_ID_HEADER = 'X-Request-ID';

/**
 * Request ID middleware for tracing
 *
 * Echoes an incoming X-Request-ID, otherwise generates one.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers['x-request-id'];
  const requestId = typeof incoming === 'string' && incoming.length > 0 ? incoming : randomUUID();
  res.setHeader(REQUEST_ID_HEADER, requestId);
  next();
}

function getRequestId(res: Response): string | undefined {
  const value = res.getHeader(REQUEST_ID_HEADER);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Client errors raised by body-parser (http-errors instances)
 */
interface HttpClientError {
  status: number;
  type?: string;
  message: string;
}

function isHttpClientError(err: unknown): err is HttpClientError {
  if (typeof err !== 'object' || err === null || !('status' in err) || !('message' in err)) {
    return false;
  }
  const { status, message } = err;
  return typeof status === 'number' && status >= 400 && status < 500 && typeof message === 'string';
}

/**
 * Normalize anything thrown by a handler or earlier middleware
 */
function toAppError(err: unknown): AppError | null {
  if (isAppError(err)) {
    return err;
  }
  if (isHttpClientError(err)) {
    if (err.type === 'entity.parse.failed') {
      return new BadRequestError('Malformed JSON body');
    }
    if (err.status === 413) {
      return new AppError('Request body too large', 'PAYLOAD_TOO_LARGE', 413);
    }
    return new AppError(err.message, 'BAD_REQUEST', err.status);
  }
  return null;
}

/**
 * Global error handler
 *
 * Typed application errors keep their status, code and message. Anything
 * else is logged in full and answered with a generic 500.
 */
export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const requestId = getRequestId(res);
  const appError = toAppError(err);

  if (appError) {
    logger.warn(
      {
        code: appError.code,
        statusCode: appError.statusCode,
        path: req.path,
        method: req.method,
        requestId,
      },
      appError.message
    );
    res.status(appError.statusCode).json({ ...appError.toJSON(), requestId });
    return;
  }

  logger.error(
    {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
      path: req.path,
      method: req.method,
      requestId,
    },
    'Request error'
  );

  res.status(500).json({
    error: 'INTERNAL_ERROR',
    message: 'Internal server error',
    requestId,
  });
};

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError('Route', 'Route not found'));
}
