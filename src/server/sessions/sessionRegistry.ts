// ============================================
// SessionRegistry Interface
// Index of live session ids (Memory or Redis)
// ============================================

import type { SessionEntry } from '../../shared/types';

export interface SessionRegistry {
  register(entry: SessionEntry): Promise<void>;
  has(sessionId: string): Promise<boolean>;
  remove(sessionId: string): Promise<boolean>;
  list(): Promise<SessionEntry[]>;
  close(): Promise<void>;
}
