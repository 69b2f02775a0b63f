// ============================================
// CleanupService
// Operator controls over the cleanup scheduler
// ============================================

import type { CleanupScheduler } from './cleanupScheduler';
import type { ArtifactStore } from '../storage/artifactStore';
import type { SessionRegistry } from '../sessions/sessionRegistry';
import type { CleanupConfigView, CleanupRunRecord, CleanupStatus, FileStats } from '../../shared/types';
import { logger, errorMessage } from '../../shared/utils/logger';

export class CleanupService {
  private readonly scheduler: CleanupScheduler;
  private readonly store: ArtifactStore;
  private readonly registry: SessionRegistry;

  constructor(scheduler: CleanupScheduler, store: ArtifactStore, registry: SessionRegistry) {
    this.scheduler = scheduler;
    this.store = store;
    this.registry = registry;
  }

  async getStatus(): Promise<CleanupStatus> {
    const intervalSeconds = this.scheduler.intervalMs / 1000;

    return {
      running: this.scheduler.isRunning(),
      cleanup_interval_seconds: intervalSeconds,
      cleanup_interval_minutes: intervalSeconds / 60,
      session_ttl_seconds: this.scheduler.ttlMs / 1000,
      thread_alive: this.scheduler.isLoopAlive(),
      pass_in_progress: this.scheduler.isPassInProgress(),
      passes_completed: this.scheduler.getPassesCompleted(),
      last_run: this.scheduler.getLastRun(),
      file_stats: await this.fileStats()
    };
  }

  getConfig(): CleanupConfigView {
    const intervalSeconds = this.scheduler.intervalMs / 1000;

    return {
      auto_cleanup_enabled: this.scheduler.isRunning(),
      cleanup_interval_seconds: intervalSeconds,
      cleanup_interval_minutes: intervalSeconds / 60,
      cleanup_interval_hours: intervalSeconds / 3600,
      session_ttl_seconds: this.scheduler.ttlMs / 1000,
      run_on_start: this.scheduler.runOnStart,
      temp_directory: this.store.root
    };
  }

  /**
   * One pass now, queued behind any pass already running.
   * `purgeAll` ignores age and removes every session.
   */
  async forceRun(options: { purgeAll?: boolean } = {}): Promise<CleanupRunRecord> {
    logger.info('🔧 Manual cleanup triggered', { purgeAll: options.purgeAll === true });

    return this.scheduler.runPass({
      trigger: 'manual',
      ttlMs: options.purgeAll ? 0 : undefined
    });
  }

  /**
   * Delete one session regardless of age. False when it does not exist.
   */
  async deleteSession(sessionId: string): Promise<boolean> {
    const removedArtifacts = await this.store.delete(sessionId);
    const removedEntry = await this.registry.remove(sessionId);
    this.scheduler.forgetSession(sessionId);

    if (removedArtifacts || removedEntry) {
      logger.info('🗑️ Session deleted on request', { sessionId });
      return true;
    }

    return false;
  }

  /**
   * Status must render even when the store cannot be read
   */
  private async fileStats(): Promise<FileStats> {
    try {
      return await this.store.stats();
    } catch (error) {
      logger.error('Failed to read file stats', { error: errorMessage(error) });
      return { active_sessions: 0, total_chart_files: 0, temp_dir: this.store.root };
    }
  }
}
