import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CLOCK, Clock } from '../common/utils/clock';
import { AckFailureEscalation, AuthError, RateLimited, errorMessage } from '../common/errors';
import { MarketplaceApiService } from '../marketplace/marketplace-api.service';
import { MarketplaceHttpClient } from '../marketplace/transport/marketplace-http.client';
import { OpsAlertService } from '../ops/ops-alert.service';

export interface AckRecord {
  eventId: string;
  merchantId: string;
  attemptCount: number;
  lastAttemptAt: number | null;
  acknowledged: boolean;
  escalated: boolean;
  /** Receipts sent for this id, one per delivery. */
  receipts: number;
  lastError?: string;
}

export interface AcknowledgeOptions {
  /**
   * The ids came from a poll: every entry gets a receipt, including ids
   * acknowledged before and repeats within the batch.
   */
  redelivered?: boolean;
}

@Injectable()
export class AcknowledgmentService {
  private readonly logger = new Logger(AcknowledgmentService.name);
  private readonly records = new Map<string, AckRecord>();
  private readonly inflight = new Map<string, Promise<void>>();
  private readonly maxAttempts: number;
  private readonly retentionMs: number;

  constructor(
    private readonly api: MarketplaceApiService,
    private readonly http: MarketplaceHttpClient,
    private readonly ops: OpsAlertService,
    private readonly config: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.maxAttempts = Math.max(1, Number(this.config.get('ACK_MAX_ATTEMPTS') ?? 6));
    this.retentionMs = Number(this.config.get('DEDUP_TTL_HOURS') ?? 24) * 60 * 60 * 1000;
  }

  /** No-op once the id is acknowledged. */
  acknowledge(merchantId: string, eventId: string): Promise<void> {
    return this.acknowledgeAll(merchantId, [eventId]);
  }

  /**
   * Sends one receipt for the ids that need one. Ids already in an attempt
   * loop wait on that loop instead of starting another. Rejects with
   * AckFailureEscalation once the attempt ceiling is hit.
   */
  async acknowledgeAll(merchantId: string, eventIds: string[], options: AcknowledgeOptions = {}): Promise<void> {
    this.prune();
    const waits = new Set<Promise<void>>();
    const fresh: string[] = [];
    for (const eventId of eventIds) {
      const running = this.inflight.get(eventId);
      if (running) {
        waits.add(running);
        continue;
      }
      if (!options.redelivered && (this.records.get(eventId)?.acknowledged || fresh.includes(eventId))) {
        continue;
      }
      fresh.push(eventId);
    }

    if (fresh.length) {
      const loop = this.deliver(merchantId, fresh);
      const unique = [...new Set(fresh)];
      for (const eventId of unique) this.inflight.set(eventId, loop);
      waits.add(
        loop.finally(() => {
          for (const eventId of unique) {
            if (this.inflight.get(eventId) === loop) this.inflight.delete(eventId);
          }
        }),
      );
    }

    const settled = await Promise.allSettled(waits);
    const failure = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) throw failure.reason;
  }

  status(eventId: string): AckRecord | null {
    const record = this.records.get(eventId);
    return record ? { ...record } : null;
  }

  private async deliver(merchantId: string, eventIds: string[]): Promise<void> {
    const records = [...new Set(eventIds)].map((eventId) => this.track(merchantId, eventId));
    let lastError = '';
    let attempt = 0;

    while (attempt < this.maxAttempts) {
      attempt += 1;
      const now = this.clock.now();
      for (const record of records) {
        record.attemptCount += 1;
        record.lastAttemptAt = now;
      }
      try {
        await this.api.acknowledgeEvents(merchantId, eventIds);
        for (const eventId of eventIds) {
          const record = this.records.get(eventId);
          if (record) record.receipts += 1;
        }
        for (const record of records) {
          record.acknowledged = true;
          record.lastError = undefined;
        }
        this.logger.debug({ msg: 'Events acknowledged', merchantId, count: eventIds.length, attempt });
        return;
      } catch (err) {
        lastError = errorMessage(err);
        for (const record of records) record.lastError = lastError;
        if (err instanceof AuthError) break;
        const backoff = this.http.delayAfter(attempt, this.maxAttempts);
        if (backoff === null) break;
        const delay = err instanceof RateLimited && err.retryAfterMs ? Math.max(backoff, err.retryAfterMs) : backoff;
        this.logger.warn({ msg: 'Acknowledgment failed; retrying', merchantId, attempt, delayMs: delay, error: lastError });
        await this.clock.sleep(delay);
      }
    }

    for (const record of records) record.escalated = true;
    const ids = records.map((record) => record.eventId);
    await this.ops.notifyOperator('critical', 'Event acknowledgment failed after max attempts', {
      merchantId,
      eventIds: ids,
      attempts: attempt,
      lastError,
    });
    throw new AckFailureEscalation(merchantId, ids, attempt, lastError);
  }

  private track(merchantId: string, eventId: string): AckRecord {
    const existing = this.records.get(eventId);
    if (existing) {
      existing.acknowledged = false;
      existing.escalated = false;
      return existing;
    }
    const record: AckRecord = {
      eventId,
      merchantId,
      attemptCount: 0,
      lastAttemptAt: null,
      acknowledged: false,
      escalated: false,
      receipts: 0,
    };
    this.records.set(eventId, record);
    return record;
  }

  private prune() {
    const cutoff = this.clock.now() - this.retentionMs;
    for (const [eventId, record] of this.records) {
      if (record.lastAttemptAt !== null && record.lastAttemptAt < cutoff && !this.inflight.has(eventId)) {
        this.records.delete(eventId);
      }
    }
  }
}
