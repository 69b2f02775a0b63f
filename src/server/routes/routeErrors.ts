import type { Response } from 'express';
import { AppError } from '../../shared/utils/errors';
import { logger, errorMessage } from '../../shared/utils/logger';

/**
 * Map a caught error onto the JSON error body every route returns
 */
export function sendRouteError(
  res: Response,
  error: unknown,
  action: string,
  meta: Record<string, unknown> = {}
): void {
  if (error instanceof AppError) {
    const log = error.status >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(action, { ...meta, code: error.code, error: error.message });

    res.status(error.status).json({
      error: error.name,
      code: error.code,
      message: error.message,
      ...(error.details ? { details: error.details } : {})
    });
    return;
  }

  logger.error(action, { ...meta, error: errorMessage(error) });

  res.status(500).json({
    error: 'Internal server error',
    message: process.env.NODE_ENV === 'production' ? 'An error occurred' : errorMessage(error)
  });
}
