// ============================================
// Server Entry Point
// ============================================

import dotenv from 'dotenv';

dotenv.config();

import { loadConfig, type ServerConfig } from './config';
import { createApp } from './app';
import { createSessionSystem, type SessionSystem } from './utils/sessionSystemFactory';
import { ConfigurationError } from '../shared/utils/errors';
import { logger, errorMessage } from '../shared/utils/logger';

async function main(): Promise<void> {
  let config: ServerConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error('❌ Invalid configuration', { problems: error.problems });
    } else {
      logger.error('❌ Failed to load configuration', { error: errorMessage(error) });
    }
    process.exit(1);
  }

  const system: SessionSystem = createSessionSystem(config);
  await system.start();

  const app = createApp(config, system);

  const server = app.listen(config.port, '0.0.0.0', () => {
    logger.info('🚀 Server started', {
      port: config.port,
      env: config.nodeEnv,
      pid: process.pid,
      tempDir: config.tempDir,
      ttlSeconds: config.sessionTtlMs / 1000,
      cleanupIntervalSeconds: config.cleanupIntervalMs / 1000
    });
  });

  const gracefulShutdown = async (signal: string): Promise<void> => {
    logger.info(`📴 Shutdown initiated - Signal: ${signal}`);

    // Force shutdown after 30s
    const forceTimer = setTimeout(() => {
      logger.warn('⚠️ Forcing shutdown after timeout');
      process.exit(1);
    }, 30000);
    forceTimer.unref();

    try {
      await system.stop();
    } catch (error) {
      logger.error('Error stopping session system', { error: errorMessage(error) });
    }

    server.close((err) => {
      if (err) {
        logger.error('Error during shutdown', { error: err.message });
        process.exit(1);
      }

      logger.info('✅ Server closed successfully');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('❌ Failed to start server', { error: errorMessage(error) });
  process.exit(1);
});
