// ============================================
// Pass Gate
// Single-slot FIFO gate: one cleanup pass at a time
// ============================================

import { logger } from '../../shared/utils/logger';

interface QueuedPass {
  id: string;
  execute: () => Promise<void>;
  timestamp: number;
}

export class PassGate {
  private queue: QueuedPass[] = [];
  private active = false;
  private passCounter = 0;
  private idleWaiters: Array<() => void> = [];
  private readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  /**
   * Run `fn` once every pass queued before it has settled.
   * Rejections reach the caller only.
   */
  run<T>(fn: () => Promise<T>): Promise<T> {
    const passId = `${this.name}-${++this.passCounter}`;

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        id: passId,
        execute: () => Promise.resolve().then(fn).then(resolve, reject),
        timestamp: Date.now()
      });

      if (this.active) {
        logger.debug(`[PassGate] ${passId} waiting for the running pass`, {
          queueLength: this.queue.length
        });
      }

      this.drain();
    });
  }

  get busy(): boolean {
    return this.active;
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Resolves once nothing is running or queued
   */
  whenIdle(): Promise<void> {
    if (!this.active && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  private drain(): void {
    if (this.active) return;

    const next = this.queue.shift();
    if (!next) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach(resolve => resolve());
      return;
    }

    this.active = true;
    const waitTime = Date.now() - next.timestamp;
    if (waitTime > 0) {
      logger.debug(`[PassGate] ${next.id} acquired`, { waitTimeMs: waitTime });
    }

    // execute() already routed the outcome to the caller
    void next.execute().finally(() => {
      this.active = false;
      this.drain();
    });
  }
}
