// ============================================
// ArtifactStore Interface
// Session artifacts keyed by session id (filesystem or memory)
// ============================================

import type {
  ArtifactEntry,
  ArtifactKind,
  ArtifactPayloads,
  ArtifactRef,
  FileStats,
  StoredSession
} from '../../shared/types';

export interface ArtifactStore {
  /** Root the store was opened on (directory path, or a label for memory) */
  readonly root: string;

  init(): Promise<void>;

  // Writes
  put<K extends ArtifactKind>(sessionId: string, kind: K, payload: ArtifactPayloads[K]): Promise<ArtifactRef>;

  // Reads
  get(sessionId: string): Promise<StoredSession | null>;
  list(): Promise<ArtifactEntry[]>;
  stats(): Promise<FileStats>;

  // Removal - idempotent, false when nothing was there
  delete(sessionId: string): Promise<boolean>;
}

/**
 * Earliest creation time per session across its artifacts
 */
export function groupBySession(entries: ArtifactEntry[]): Map<string, { createdAt: number; kinds: Set<ArtifactKind> }> {
  const sessions = new Map<string, { createdAt: number; kinds: Set<ArtifactKind> }>();

  for (const entry of entries) {
    const current = sessions.get(entry.sessionId);
    if (current) {
      current.createdAt = Math.min(current.createdAt, entry.createdAt);
      current.kinds.add(entry.kind);
    } else {
      sessions.set(entry.sessionId, { createdAt: entry.createdAt, kinds: new Set([entry.kind]) });
    }
  }

  return sessions;
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

/**
 * Session ids become path segments; refuse anything that could escape the root
 */
export function isValidSessionId(sessionId: string): boolean {
  return SESSION_ID_PATTERN.test(sessionId);
}
