import type { Request, Response, NextFunction } from 'express';
import { describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';

const log = logger.child({ module: 'control-api' });

export interface ApiResponse<T> {
  success: boolean;
  data: T | null;
  error: { code: string; message: string; details?: string; retryable?: boolean } | null;
}

export function successResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data, error: null };
}

export function errorResponse(code: string, message: string, details?: string, retryable?: boolean): ApiResponse<null> {
  return { success: false, data: null, error: { code, message, details, retryable } };
}

function isAppError(value: unknown): value is AppError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    'retryable' in value
  );
}

function mapErrorCodeToStatus(code: string): number {
  switch (code) {
    case ErrorCode.CONFIG_INVALID:
      return 400;

    case ErrorCode.CANCELLED:
      return 409;

    case ErrorCode.PORTAL_UNREACHABLE:
    case ErrorCode.NAVIGATION_TIMEOUT:
    case ErrorCode.EXTRACTION_UNAVAILABLE:
    case ErrorCode.EXTRACTION_RATE_LIMITED:
    case ErrorCode.DB_CONNECTION_ERROR:
    case ErrorCode.LANGFUSE_UNAVAILABLE:
      return 503;

    default:
      return 500;
  }
}

export function sendAppError(res: Response, appError: AppError): void {
  const status = mapErrorCodeToStatus(appError.code);
  res.status(status).json(errorResponse(appError.code, appError.message, appError.details, appError.retryable));
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(errorResponse('NOT_FOUND', `No route for ${req.method} ${req.path}`));
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (isAppError(err)) {
    sendAppError(res, err);
    return;
  }

  log.error({ details: describeCause(err) }, 'Unhandled error');
  res.status(500).json(errorResponse('INTERNAL_ERROR', 'An unexpected error occurred', undefined, false));
}
