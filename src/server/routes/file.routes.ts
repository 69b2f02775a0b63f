// ============================================
// File Routes
// Upload, session read and chart generation
// ============================================

import { Router, type Request, type Response, type RequestHandler } from 'express';
import type { SessionService } from '../sessions/sessionService';
import {
  validateRequest,
  uploadRequestSchema,
  chartRequestSchema,
  sessionParamsSchema
} from '../../shared/middleware/validation';
import { sendRouteError } from './routeErrors';
import { logger } from '../../shared/utils/logger';

export function createFileRouter(sessionService: SessionService, authenticate: RequestHandler): Router {
  const router = Router();

  // ============================================
  // POST /file/upload
  // ============================================

  router.post(
    '/file/upload',
    authenticate,
    validateRequest(uploadRequestSchema),
    async (req: Request, res: Response) => {
      const { filename, content_base64: contentBase64, content_type: contentType } = req.body;

      try {
        logger.info('📤 File upload received', { filename });

        const result = await sessionService.createSession({
          filename,
          contentType,
          data: Buffer.from(contentBase64, 'base64')
        });

        res.status(201).json(result);
      } catch (error) {
        sendRouteError(res, error, 'File upload failed', { filename });
      }
    }
  );

  // ============================================
  // GET /file/session/:id
  // ============================================

  router.get(
    '/file/session/:id',
    authenticate,
    validateRequest(sessionParamsSchema, 'params'),
    async (req: Request, res: Response) => {
      try {
        res.json(await sessionService.getSession(req.params.id));
      } catch (error) {
        sendRouteError(res, error, 'Failed to read session', { sessionId: req.params.id });
      }
    }
  );

  // ============================================
  // POST /file/session/:id/charts
  // ============================================

  router.post(
    '/file/session/:id/charts',
    authenticate,
    validateRequest(sessionParamsSchema, 'params'),
    validateRequest(chartRequestSchema),
    async (req: Request, res: Response) => {
      const sessionId = req.params.id;

      try {
        const record = await sessionService.generateCharts(sessionId, {
          model: req.body.model,
          maxCharts: req.body.max_charts
        });
        res.json(record);
      } catch (error) {
        sendRouteError(res, error, 'Chart generation failed', { sessionId });
      }
    }
  );

  return router;
}
