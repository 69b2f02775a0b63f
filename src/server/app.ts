// ============================================
// Express Application
// ============================================

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import type { ServerConfig } from './config';
import type { SessionSystem } from './utils/sessionSystemFactory';
import { createCleanupRouter } from './routes/cleanup.routes';
import { createFileRouter } from './routes/file.routes';
import { createSystemRouter } from './routes/system.routes';
import { authenticateBearer } from '../shared/middleware/auth';
import { sendRouteError } from './routes/routeErrors';
import { logger } from '../shared/utils/logger';

export function createApp(config: ServerConfig, system: SessionSystem): express.Express {
  const app = express();

  // ============================================
  // Middlewares
  // ============================================

  app.use(helmet());
  app.use(cors({ origin: config.corsOrigins }));
  app.use(compression());
  // base64 inflates uploads by a third
  const bodyLimit = Math.ceil(config.maxUploadBytes * 1.4) + 64 * 1024;
  app.use(express.json({ limit: bodyLimit }));

  app.use((req, _res, next) => {
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip
    });
    next();
  });

  // ============================================
  // Health Check
  // ============================================

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      service: 'Chart Session Server',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      cleanup: {
        running: system.scheduler.isRunning()
      }
    });
  });

  // ============================================
  // Routes
  // ============================================

  const authenticate = authenticateBearer(config.apiToken);

  app.use('/', createCleanupRouter(system.cleanupService, authenticate));
  app.use('/', createFileRouter(system.sessionService, authenticate));
  app.use('/', createSystemRouter(config, system.sessionService, authenticate));

  app.use((req, res) => {
    res.status(404).json({
      error: 'Not found',
      message: `No route for ${req.method} ${req.path}`
    });
  });

  // ============================================
  // Error Handler
  // ============================================

  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (isBodyParserError(err)) {
      logger.warn('Rejected request body', { path: req.path, error: err.message });
      res.status(err.status).json({
        error: err.status === 413 ? 'Payload too large' : 'Bad request',
        message: err.message
      });
      return;
    }

    sendRouteError(res, err, 'Unhandled error', { path: req.path });
  });

  return app;
}

function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
  return (
    err instanceof Error &&
    'type' in err &&
    typeof err.type === 'string' &&
    'status' in err &&
    typeof err.status === 'number'
  );
}
