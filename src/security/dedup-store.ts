/**
 * Update Deduplication Store
 *
 * Telegram redelivers an update when a webhook call times out; each
 * (bot, update_id) pair is handled once. Redis SET NX with a TTL,
 * in-memory fallback with oldest-first eviction.
 */

import Redis from 'ioredis';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const DEFAULT_TTL_SECONDS = 3600;

export interface DedupStore {
  /** Returns true if this update has not been seen before */
  isNew(bot: string, updateId: number): Promise<boolean>;
}

// ───── Redis Implementation ─────────────────────────────────────

export class RedisDedupStore implements DedupStore {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds = DEFAULT_TTL_SECONDS,
  ) {}

  async isNew(bot: string, updateId: number): Promise<boolean> {
    try {
      const result = await this.redis.set(
        `${env.redis.keyPrefix}update:${bot}:${updateId}`,
        '1',
        'EX',
        this.ttlSeconds,
        'NX',
      );
      return result === 'OK';
    } catch (err) {
      logger.warn({ err, bot, updateId }, 'Update dedup check failed; processing update');
      return true;
    }
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryDedupStore implements DedupStore {
  private readonly seen = new Map<string, number>();

  constructor(
    private readonly ttlSeconds = DEFAULT_TTL_SECONDS,
    private readonly maxSize = 50_000,
    private readonly now: () => number = Date.now,
  ) {}

  async isNew(bot: string, updateId: number): Promise<boolean> {
    const key = `${bot}:${updateId}`;
    const now = this.now();
    const seenAt = this.seen.get(key);

    if (seenAt !== undefined && now - seenAt < this.ttlSeconds * 1000) {
      return false;
    }

    if (this.seen.size >= this.maxSize) {
      const oldest = this.seen.keys().next().value;
      if (oldest !== undefined) this.seen.delete(oldest);
    }

    this.seen.delete(key);
    this.seen.set(key, now);
    return true;
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createDedupStore(redis?: Redis): DedupStore {
  if (redis) {
    logger.info('Update dedup store: Redis-backed (SET NX)');
    return new RedisDedupStore(redis);
  }
  logger.info('Update dedup store: in-memory');
  return new InMemoryDedupStore();
}
