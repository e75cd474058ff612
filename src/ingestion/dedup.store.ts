import { Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { errorMessage } from '../common/errors';

export const DEDUP_STORE = Symbol('DEDUP_STORE');

export interface DedupStore {
  /** Records the id for `ttlMs`. True only for the caller that recorded it first. */
  claim(eventId: string, ttlMs: number): Promise<boolean>;
}

const SWEEP_INTERVAL_MS = 60_000;

/** Time-based retention, no capacity eviction. Check-and-set happens without an await in between. */
export class MemoryDedupStore implements DedupStore {
  private readonly seen = new Map<string, number>();
  private lastSweepAt = 0;

  constructor(private readonly now: () => number = () => Date.now()) {}

  async claim(eventId: string, ttlMs: number): Promise<boolean> {
    const now = this.now();
    if (now - this.lastSweepAt >= SWEEP_INTERVAL_MS) {
      this.sweep(now);
    }
    const expiresAt = this.seen.get(eventId);
    if (expiresAt !== undefined && expiresAt > now) {
      return false;
    }
    this.seen.set(eventId, now + ttlMs);
    return true;
  }

  sweep(now = this.now()) {
    this.lastSweepAt = now;
    for (const [eventId, expiresAt] of this.seen) {
      if (expiresAt <= now) this.seen.delete(eventId);
    }
  }

  size() {
    return this.seen.size;
  }
}

/** `SET NX PX` so every connector instance shares one seen-set. */
export class RedisDedupStore implements DedupStore, OnModuleDestroy {
  private readonly logger = new Logger(RedisDedupStore.name);

  constructor(
    private readonly client: Redis,
    private readonly prefix = 'marketplace:dedup:',
  ) {}

  async claim(eventId: string, ttlMs: number): Promise<boolean> {
    const result = await this.client.set(`${this.prefix}${eventId}`, '1', 'PX', ttlMs, 'NX');
    return result === 'OK';
  }

  async onModuleDestroy() {
    try {
      await this.client.quit();
    } catch (err) {
      this.logger.warn(`Redis dedup client did not close cleanly: ${errorMessage(err)}`);
    }
  }
}
