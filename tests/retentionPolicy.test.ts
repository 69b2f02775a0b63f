import { describe, expect, it } from 'vitest';
import { isExpired, RetentionPolicy } from '../src/server/cleanup/retentionPolicy';

const TTL = 300_000;

describe('isExpired', () => {
  it('expires exactly when the age reaches the ttl', () => {
    expect(isExpired(0, 299_999, TTL)).toBe(false);
    expect(isExpired(0, 300_000, TTL)).toBe(true);
    expect(isExpired(1_000, 301_000, TTL)).toBe(true);
  });

  it('matches now - createdAt >= ttl across a grid of values', () => {
    const createdAts = [0, 5, 1_000, 250_000];
    const nows = [0, 4, 1_000, 300_000, 550_000, 600_000];
    const ttls = [1, 1_000, TTL];

    for (const createdAt of createdAts) {
      for (const now of nows) {
        for (const ttl of ttls) {
          expect(isExpired(createdAt, now, ttl)).toBe(now - createdAt >= ttl);
        }
      }
    }
  });

  it('stays expired for every later now', () => {
    let seenExpired = false;
    for (let now = 0; now <= 400_000; now += 10_000) {
      const expired = isExpired(50_000, now, TTL);
      if (seenExpired) {
        expect(expired).toBe(true);
      }
      seenExpired = seenExpired || expired;
    }
    expect(seenExpired).toBe(true);
  });

  it('treats a non-positive ttl as immediate expiry', () => {
    expect(isExpired(1_000, 0, 0)).toBe(true);
    expect(isExpired(1_000, 1_000, 0)).toBe(true);
    expect(isExpired(1_000, 1_000, -5)).toBe(true);
  });
});

describe('RetentionPolicy', () => {
  it('keeps a session expired when the clock moves backwards', () => {
    const policy = new RetentionPolicy(TTL);

    expect(policy.isExpired('s1', 0, 300_000)).toBe(true);
    expect(policy.isExpired('s1', 0, 10_000)).toBe(true);
    expect(policy.latchedCount).toBe(1);
  });

  it('reports which sessions are latched', () => {
    const policy = new RetentionPolicy(TTL);

    policy.isExpired('old', 0, 300_000);
    policy.isExpired('fresh', 200_000, 300_000);

    expect(policy.isLatched('old')).toBe(true);
    expect(policy.isLatched('fresh')).toBe(false);
  });

  it('releases the latch on forget', () => {
    const policy = new RetentionPolicy(TTL);

    policy.isExpired('s1', 0, 300_000);
    policy.forget('s1');

    expect(policy.isExpired('s1', 0, 10_000)).toBe(false);
    expect(policy.latchedCount).toBe(0);
  });

  it('does not latch sessions expired only by an override ttl', () => {
    const policy = new RetentionPolicy(TTL);

    expect(policy.isExpired('s1', 0, 10_000, 0)).toBe(true);
    expect(policy.isExpired('s1', 0, 10_000)).toBe(false);
    expect(policy.latchedCount).toBe(0);
  });
});
