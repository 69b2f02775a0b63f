// ============================================
// Session System Factory
// Wires storage, registry, cleanup and request services
// ============================================

import type { ServerConfig } from '../config';
import { type ArtifactStore, groupBySession } from '../storage/artifactStore';
import { FileArtifactStore } from '../storage/fileArtifactStore';
import { MemoryArtifactStore } from '../storage/memoryArtifactStore';
import type { SessionRegistry } from '../sessions/sessionRegistry';
import { MemorySessionRegistry } from '../sessions/memorySessionRegistry';
import { RedisSessionRegistry } from '../sessions/redisSessionRegistry';
import { SessionService } from '../sessions/sessionService';
import { CleanupScheduler } from '../cleanup/cleanupScheduler';
import { CleanupService } from '../cleanup/cleanupService';
import type { ChartGenerator } from '../charts/chartGenerator';
import { LlmChartGenerator } from '../charts/llmChartGenerator';
import { logger } from '../../shared/utils/logger';

export interface SessionSystem {
  store: ArtifactStore;
  registry: SessionRegistry;
  scheduler: CleanupScheduler;
  cleanupService: CleanupService;
  sessionService: SessionService;
  start: () => Promise<void>;
  stop: () => Promise<void>;
}

export interface SessionSystemOverrides {
  store?: ArtifactStore;
  registry?: SessionRegistry;
  chartGenerator?: ChartGenerator | null;
  clock?: () => number;
}

export function createSessionSystem(config: ServerConfig, overrides: SessionSystemOverrides = {}): SessionSystem {
  logger.info('🏗️ Initializing Session System');

  // 1. Artifact store
  let store: ArtifactStore;
  if (overrides.store) {
    store = overrides.store;
  } else if (config.artifactStore === 'memory') {
    store = new MemoryArtifactStore('memory://artifacts', overrides.clock);
    logger.info('📦 Using MemoryArtifactStore');
  } else {
    store = new FileArtifactStore(config.tempDir, overrides.clock);
    logger.info('📦 Using FileArtifactStore', { tempDir: config.tempDir });
  }

  // 2. Session registry
  let registry: SessionRegistry;
  if (overrides.registry) {
    registry = overrides.registry;
  } else if (config.sessionRegistry === 'redis') {
    registry = new RedisSessionRegistry(config.redisUrl);
  } else {
    registry = new MemorySessionRegistry();
  }

  // 3. Chart generator (optional)
  const chartGenerator = overrides.chartGenerator !== undefined
    ? overrides.chartGenerator
    : createChartGenerator(config);

  // 4. Cleanup
  const scheduler = new CleanupScheduler(store, registry, {
    ttlMs: config.sessionTtlMs,
    intervalMs: config.cleanupIntervalMs,
    runOnStart: config.runCleanupOnStart,
    clock: overrides.clock
  });
  const cleanupService = new CleanupService(scheduler, store, registry);

  // 5. Request path
  const sessionService = new SessionService(store, registry, chartGenerator, {
    maxUploadBytes: config.maxUploadBytes,
    allowedExtensions: config.allowedExtensions,
    models: config.llm.models
  });

  logger.info('✅ Session System initialized');

  return {
    store,
    registry,
    scheduler,
    cleanupService,
    sessionService,

    start: async () => {
      logger.info('🚀 Starting Session System');
      await store.init();
      await hydrateRegistry(store, registry);

      if (config.autoCleanupEnabled) {
        scheduler.start();
      } else {
        logger.warn('⚠️ Automatic cleanup disabled - sessions are only removed on demand');
      }
    },

    stop: async () => {
      logger.info('🛑 Stopping Session System');
      if (scheduler.isRunning()) {
        await scheduler.stop();
      }
      await registry.close();
    }
  };
}

function createChartGenerator(config: ServerConfig): ChartGenerator | null {
  if (!config.llm.apiKey) {
    logger.warn('⚠️ LLM_API_KEY not set - chart generation disabled');
    return null;
  }
  return new LlmChartGenerator(config.llm);
}

/**
 * Re-register sessions that survived a restart so the registry matches the store
 */
export async function hydrateRegistry(store: ArtifactStore, registry: SessionRegistry): Promise<number> {
  const sessions = groupBySession(await store.list());
  let restored = 0;

  for (const [sessionId, info] of sessions) {
    if (!(await registry.has(sessionId))) {
      await registry.register({ sessionId, createdAt: info.createdAt });
      restored++;
    }
  }

  if (restored > 0) {
    logger.info('♻️ Session registry restored from storage', { restored });
  }

  return restored;
}
