import Redis from 'ioredis';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { IntakeState, isIntakeState } from './types';

export interface IntakeStateStore {
  get(conversationId: number): Promise<IntakeState | null>;
  set(conversationId: number, state: IntakeState): Promise<void>;
  clear(conversationId: number): Promise<void>;
}

/**
 * Redis-backed intake state, one JSON value per conversation with a TTL.
 * Keys are namespaced per bot.
 */
export class RedisIntakeStateStore implements IntakeStateStore {
  private readonly prefix: string;

  constructor(
    private readonly redis: Redis,
    botName: string,
    private readonly ttlSeconds: number,
  ) {
    this.prefix = `${env.redis.keyPrefix}intake:${botName}:`;
  }

  private key(conversationId: number): string {
    return `${this.prefix}${conversationId}`;
  }

  async get(conversationId: number): Promise<IntakeState | null> {
    const raw = await this.redis.get(this.key(conversationId));
    if (!raw) return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      logger.warn({ err, conversationId }, 'Discarding unreadable intake state');
      await this.clear(conversationId);
      return null;
    }
    if (!isIntakeState(parsed)) {
      logger.warn({ conversationId }, 'Discarding intake state with unexpected shape');
      await this.clear(conversationId);
      return null;
    }
    return parsed;
  }

  async set(conversationId: number, state: IntakeState): Promise<void> {
    await this.redis.set(this.key(conversationId), JSON.stringify(state), 'EX', this.ttlSeconds);
  }

  async clear(conversationId: number): Promise<void> {
    await this.redis.del(this.key(conversationId));
  }
}

/**
 * In-memory intake state (dev / tests). Entries expire lazily on read.
 */
const SWEEP_INTERVAL_MS = 60_000;

export class InMemoryIntakeStateStore implements IntakeStateStore {
  private states = new Map<number, { state: IntakeState; expiresAt: number }>();
  private nextSweepAt = 0;

  constructor(
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now,
  ) {}

  async get(conversationId: number): Promise<IntakeState | null> {
    const entry = this.states.get(conversationId);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.states.delete(conversationId);
      return null;
    }
    return structuredClone(entry.state);
  }

  async set(conversationId: number, state: IntakeState): Promise<void> {
    const now = this.now();
    if (now >= this.nextSweepAt) this.sweep(now);
    this.states.set(conversationId, {
      state: structuredClone(state),
      expiresAt: now + this.ttlSeconds * 1000,
    });
  }

  async clear(conversationId: number): Promise<void> {
    this.states.delete(conversationId);
  }

  get size(): number {
    return this.states.size;
  }

  /** Drop abandoned conversations; runs on write at most once per interval */
  private sweep(now: number): void {
    for (const [conversationId, entry] of this.states) {
      if (entry.expiresAt <= now) this.states.delete(conversationId);
    }
    this.nextSweepAt = now + Math.min(this.ttlSeconds * 1000, SWEEP_INTERVAL_MS);
  }
}

export function createIntakeStateStore(botName: string, ttlSeconds: number, redis?: Redis): IntakeStateStore {
  if (redis) return new RedisIntakeStateStore(redis, botName, ttlSeconds);
  logger.info({ bot: botName }, 'Using in-memory intake state store (no Redis)');
  return new InMemoryIntakeStateStore(ttlSeconds);
}
