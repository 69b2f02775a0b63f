import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../utils/logger';

// ============================================
// Middleware: Bearer Token Authentication
// Tokens are issued elsewhere; this only compares them
// ============================================

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;

  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return null;
  }

  return parts[1];
}

/**
 * Without an expected token every request is let through (local development)
 */
export function authenticateBearer(expectedToken: string | undefined): RequestHandler {
  if (!expectedToken) {
    logger.warn('⚠️ API_TOKEN not set - bearer authentication disabled');
  }

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expectedToken) {
      next();
      return;
    }

    const token = extractBearerToken(req.get('Authorization'));

    if (!token || token !== expectedToken) {
      logger.warn('Unauthorized request - invalid bearer token', {
        ip: req.ip,
        path: req.path
      });

      res.status(401).json({
        error: 'Unauthorized',
        message: 'Invalid or missing bearer token'
      });
      return;
    }

    next();
  };
}
