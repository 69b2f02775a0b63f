// ============================================
// Retention Policy
// Time-based expiry for session artifacts
// ============================================

/**
 * True when an artifact created at `createdAt` has outlived `ttlMs` at `now`.
 * A non-positive TTL expires everything.
 */
export function isExpired(createdAt: number, now: number, ttlMs: number): boolean {
  if (ttlMs <= 0) {
    return true;
  }
  return now - createdAt >= ttlMs;
}

/**
 * Applies isExpired and remembers every session it has seen expire, so a
 * clock that steps backwards never turns an expired session fresh again.
 */
export class RetentionPolicy {
  private readonly ttlMs: number;
  private readonly expired = new Set<string>();

  constructor(ttlMs: number) {
    this.ttlMs = ttlMs;
  }

  get ttl(): number {
    return this.ttlMs;
  }

  isExpired(sessionId: string, createdAt: number, now: number, ttlMs: number = this.ttlMs): boolean {
    if (this.expired.has(sessionId)) {
      return true;
    }

    // An override only widens what is expired; it never latches
    if (ttlMs !== this.ttlMs) {
      return isExpired(createdAt, now, ttlMs) || isExpired(createdAt, now, this.ttlMs);
    }

    if (isExpired(createdAt, now, ttlMs)) {
      this.expired.add(sessionId);
      return true;
    }

    return false;
  }

  isLatched(sessionId: string): boolean {
    return this.expired.has(sessionId);
  }

  /**
   * Drop the latch once the session is gone for good
   */
  forget(sessionId: string): void {
    this.expired.delete(sessionId);
  }

  get latchedCount(): number {
    return this.expired.size;
  }
}
