// ============================================
// Cleanup Routes
// Operator endpoints for the session cleanup subsystem
// ============================================

import { Router, type Request, type Response, type RequestHandler } from 'express';
import type { CleanupService } from '../cleanup/cleanupService';
import { validateRequest, forceCleanupSchema, sessionParamsSchema } from '../../shared/middleware/validation';
import { sendRouteError } from './routeErrors';
import { logger } from '../../shared/utils/logger';

export function createCleanupRouter(cleanupService: CleanupService, authenticate: RequestHandler): Router {
  const router = Router();

  // ============================================
  // GET /cleanup/status
  // ============================================

  router.get('/cleanup/status', authenticate, async (_req: Request, res: Response) => {
    try {
      logger.info('📊 Cleanup status requested');
      res.json(await cleanupService.getStatus());
    } catch (error) {
      sendRouteError(res, error, 'Failed to get cleanup status');
    }
  });

  // ============================================
  // GET /cleanup/config
  // ============================================

  router.get('/cleanup/config', authenticate, (_req: Request, res: Response) => {
    res.json(cleanupService.getConfig());
  });

  // ============================================
  // POST /cleanup/force
  // Runs one pass now; partial failures are reported in the body, not as 5xx
  // ============================================

  router.post(
    '/cleanup/force',
    authenticate,
    validateRequest(forceCleanupSchema),
    async (req: Request, res: Response) => {
      try {
        const record = await cleanupService.forceRun({ purgeAll: req.body.purge_all === true });
        res.json(record);
      } catch (error) {
        sendRouteError(res, error, 'Manual cleanup failed');
      }
    }
  );

  // ============================================
  // DELETE /cleanup/session/:id
  // ============================================

  router.delete(
    '/cleanup/session/:id',
    authenticate,
    validateRequest(sessionParamsSchema, 'params'),
    async (req: Request, res: Response) => {
      const sessionId = req.params.id;

      try {
        const deleted = await cleanupService.deleteSession(sessionId);

        if (!deleted) {
          logger.warn('Session not found for deletion', { sessionId });
          res.status(404).json({
            error: 'Session not found',
            message: `Session ${sessionId} does not exist`
          });
          return;
        }

        res.json({
          session_id: sessionId,
          deleted: true,
          message: `Session ${sessionId} deleted`
        });
      } catch (error) {
        sendRouteError(res, error, 'Failed to delete session', { sessionId });
      }
    }
  );

  return router;
}
