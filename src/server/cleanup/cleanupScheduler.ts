// ============================================
// CleanupScheduler
// Background deletion of expired session artifacts
// ============================================

import { type ArtifactStore, groupBySession } from '../storage/artifactStore';
import type { SessionRegistry } from '../sessions/sessionRegistry';
import { RetentionPolicy } from './retentionPolicy';
import { PassGate } from './passGate';
import type {
  CleanupFailure,
  CleanupRunRecord,
  PassTrigger,
  SchedulerState
} from '../../shared/types';
import { logger, errorMessage } from '../../shared/utils/logger';

export interface CleanupSchedulerOptions {
  ttlMs: number;
  intervalMs: number;
  runOnStart?: boolean;
  clock?: () => number;
}

export interface RunPassOptions {
  trigger: PassTrigger;
  /** Replaces the configured TTL for this pass only; 0 purges everything */
  ttlMs?: number;
}

export class CleanupScheduler {
  private readonly store: ArtifactStore;
  private readonly registry: SessionRegistry;
  private readonly policy: RetentionPolicy;
  private readonly gate = new PassGate('cleanup');
  private readonly clock: () => number;

  readonly intervalMs: number;
  readonly runOnStart: boolean;

  private state: SchedulerState = 'stopped';
  private generation = 0; // bumps on every start so a stale loop cannot reschedule
  private timer?: NodeJS.Timeout;
  private loopPass?: Promise<void>;
  private lastRun: CleanupRunRecord | null = null;
  private passesCompleted = 0;

  constructor(store: ArtifactStore, registry: SessionRegistry, options: CleanupSchedulerOptions) {
    this.store = store;
    this.registry = registry;
    this.policy = new RetentionPolicy(options.ttlMs);
    this.intervalMs = options.intervalMs;
    this.runOnStart = options.runOnStart ?? true;
    this.clock = options.clock ?? Date.now;

    logger.info('🧹 CleanupScheduler initialized', {
      ttl: `${options.ttlMs / 1000}s`,
      interval: `${options.intervalMs / 1000}s`,
      runOnStart: this.runOnStart
    });
  }

  get ttlMs(): number {
    return this.policy.ttl;
  }

  // ============================================
  // Lifecycle
  // ============================================

  start(): void {
    if (this.state === 'running') {
      logger.warn('⚠️ CleanupScheduler already running');
      return;
    }

    this.state = 'running';
    const generation = ++this.generation;

    logger.info('🚀 CleanupScheduler started', {
      interval: `${this.intervalMs / 1000}s`,
      ttl: `${this.policy.ttl / 1000}s`
    });

    if (this.runOnStart) {
      this.tick(generation);
    } else {
      this.scheduleNextPass(generation);
    }
  }

  /**
   * Cancels the pending wait immediately, then waits for any pass still
   * running (timer or manual) before resolving.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') {
      logger.warn('⚠️ CleanupScheduler is not running');
      return;
    }

    this.state = 'stopped';

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }

    if (this.gate.busy || this.gate.pending > 0) {
      logger.info('⏸️ Waiting for the running cleanup pass to finish');
    }

    await this.gate.whenIdle();
    if (this.loopPass) {
      await this.loopPass;
    }

    logger.info('🛑 CleanupScheduler stopped');
  }

  private scheduleNextPass(generation: number): void {
    if (this.state !== 'running' || generation !== this.generation) return;

    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.tick(generation);
    }, this.intervalMs);
  }

  private tick(generation: number): void {
    const pass: Promise<void> = this.runPass({ trigger: 'interval' })
      .then(
        () => undefined,
        (error: unknown) => {
          // Store unavailable; try again next interval
          logger.error('❌ Scheduled cleanup pass failed', { error: errorMessage(error) });
        }
      )
      .finally(() => {
        if (this.loopPass === pass) {
          this.loopPass = undefined;
        }
        this.scheduleNextPass(generation);
      });
    this.loopPass = pass;
  }

  // ============================================
  // Pass
  // ============================================

  /**
   * Run one deletion pass. Passes never overlap: a call made while another
   * pass is running waits for it.
   */
  runPass(options: RunPassOptions): Promise<CleanupRunRecord> {
    return this.gate.run(() => this.executePass(options));
  }

  private async executePass(options: RunPassOptions): Promise<CleanupRunRecord> {
    const ttlMs = options.ttlMs ?? this.policy.ttl;
    const startedAt = this.clock();

    const statsBefore = await this.store.stats();

    // Anything created after this instant is out of scope for this pass
    const now = this.clock();
    const sessions = groupBySession(await this.store.list());

    let sessionsCleaned = 0;
    let chartsCleaned = 0;
    const failures: CleanupFailure[] = [];

    for (const [sessionId, info] of sessions) {
      // Created after the snapshot, unless an earlier pass already saw it expire
      if (info.createdAt > now && !this.policy.isLatched(sessionId)) continue;
      if (!this.policy.isExpired(sessionId, info.createdAt, now, ttlMs)) continue;

      let removed: boolean;
      try {
        removed = await this.store.delete(sessionId);
      } catch (error) {
        failures.push({ session_id: sessionId, error: errorMessage(error) });
        logger.error('❌ Failed to delete expired session', {
          sessionId,
          error: errorMessage(error)
        });
        continue;
      }

      this.policy.forget(sessionId);
      await this.unregister(sessionId);

      if (removed) {
        sessionsCleaned++;
        if (info.kinds.has('chart')) chartsCleaned++;
        logger.debug('🗑️ Expired session removed', {
          sessionId,
          ageSeconds: Math.floor((now - info.createdAt) / 1000)
        });
      }
    }

    const registryPruned = await this.pruneRegistry(sessions, now, ttlMs);
    const statsAfter = await this.store.stats();
    const finishedAt = this.clock();

    const record: CleanupRunRecord = {
      trigger: options.trigger,
      started_at: new Date(startedAt).toISOString(),
      finished_at: new Date(finishedAt).toISOString(),
      duration_ms: finishedAt - startedAt,
      ttl_seconds: ttlMs / 1000,
      sessions_cleaned: sessionsCleaned,
      charts_cleaned: chartsCleaned,
      sessions_failed: failures.length,
      failures,
      registry_pruned: registryPruned,
      stats_before: statsBefore,
      stats_after: statsAfter,
      temp_dir: this.store.root,
      message: describePass(sessionsCleaned, chartsCleaned, failures.length)
    };

    this.lastRun = record;
    this.passesCompleted++;

    const logMeta = {
      trigger: record.trigger,
      sessionsCleaned,
      chartsCleaned,
      failed: failures.length,
      durationMs: record.duration_ms
    };
    if (failures.length > 0) {
      logger.warn('⚠️ Cleanup pass completed with failures', logMeta);
    } else if (sessionsCleaned > 0 || chartsCleaned > 0 || options.trigger === 'manual') {
      logger.info('🧹 Cleanup pass completed', logMeta);
    } else {
      logger.debug('🧹 Cleanup pass completed - nothing to clean', logMeta);
    }

    return record;
  }

  /**
   * Registry entries whose artifacts are already gone (failed upload,
   * partial manual delete) expire on the same TTL
   */
  private async pruneRegistry(
    listed: Map<string, unknown>,
    now: number,
    ttlMs: number
  ): Promise<number> {
    let pruned = 0;
    try {
      for (const entry of await this.registry.list()) {
        if (listed.has(entry.sessionId)) continue;
        if (entry.createdAt > now && !this.policy.isLatched(entry.sessionId)) continue;
        if (!this.policy.isExpired(entry.sessionId, entry.createdAt, now, ttlMs)) continue;

        if (await this.registry.remove(entry.sessionId)) {
          pruned++;
        }
        this.policy.forget(entry.sessionId);
      }
    } catch (error) {
      logger.error('❌ Session registry prune failed', { error: errorMessage(error) });
    }
    return pruned;
  }

  private async unregister(sessionId: string): Promise<void> {
    try {
      await this.registry.remove(sessionId);
    } catch (error) {
      // Left for pruneRegistry on a later pass
      logger.warn('⚠️ Failed to unregister session', { sessionId, error: errorMessage(error) });
    }
  }

  /**
   * Drop retention state for a session deleted outside a pass
   */
  forgetSession(sessionId: string): void {
    this.policy.forget(sessionId);
  }

  // ============================================
  // Introspection
  // ============================================

  getState(): SchedulerState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  /** A timer is armed or the loop's own pass is executing */
  isLoopAlive(): boolean {
    return this.state === 'running' && (this.timer !== undefined || this.loopPass !== undefined);
  }

  isPassInProgress(): boolean {
    return this.gate.busy;
  }

  getLastRun(): CleanupRunRecord | null {
    return this.lastRun;
  }

  getPassesCompleted(): number {
    return this.passesCompleted;
  }
}

function describePass(sessions: number, charts: number, failed: number): string {
  const base = `Cleanup removed ${sessions} session(s) and ${charts} chart file(s)`;
  return failed > 0 ? `${base}; ${failed} session(s) could not be deleted` : base;
}
