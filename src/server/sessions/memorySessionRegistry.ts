// ============================================
// MemorySessionRegistry
// ============================================

import type { SessionEntry } from '../../shared/types';
import type { SessionRegistry } from './sessionRegistry';
import { logger } from '../../shared/utils/logger';

export class MemorySessionRegistry implements SessionRegistry {
  private sessions: Map<string, SessionEntry> = new Map();

  constructor() {
    logger.info('📦 MemorySessionRegistry initialized');
  }

  async register(entry: SessionEntry): Promise<void> {
    // created_at is immutable once set
    if (!this.sessions.has(entry.sessionId)) {
      this.sessions.set(entry.sessionId, { ...entry });
      logger.debug('✅ Session registered', { sessionId: entry.sessionId });
    }
  }

  async has(sessionId: string): Promise<boolean> {
    return this.sessions.has(sessionId);
  }

  async remove(sessionId: string): Promise<boolean> {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      logger.debug('🗑️ Session unregistered', { sessionId });
    }
    return removed;
  }

  async list(): Promise<SessionEntry[]> {
    return Array.from(this.sessions.values()).map(entry => ({ ...entry }));
  }

  async close(): Promise<void> {
    this.sessions.clear();
  }
}
