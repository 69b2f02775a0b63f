// ============================================
// System Routes
// Service metadata and the chart model catalogue
// ============================================

import { Router, type Request, type Response, type RequestHandler } from 'express';
import type { ServerConfig } from '../config';
import type { SessionService } from '../sessions/sessionService';
import packageJson from '../../../package.json';

export function createSystemRouter(
  config: ServerConfig,
  sessionService: SessionService,
  authenticate: RequestHandler
): Router {
  const router = Router();

  // ============================================
  // GET /info
  // Public, like /health
  // ============================================

  router.get('/info', (_req: Request, res: Response) => {
    res.json({
      name: packageJson.name,
      version: packageJson.version,
      description: packageJson.description,
      timestamp: new Date().toISOString(),
      uploads: {
        allowed_extensions: config.allowedExtensions,
        max_upload_bytes: config.maxUploadBytes
      },
      session_ttl_seconds: config.sessionTtlMs / 1000
    });
  });

  // ============================================
  // GET /models
  // ============================================

  router.get('/models', authenticate, (_req: Request, res: Response) => {
    res.json({ models: sessionService.listModels() });
  });

  return router;
}
