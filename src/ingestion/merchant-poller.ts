import { Logger } from '@nestjs/common';
import { AuthError, errorMessage } from '../common/errors';
import { Clock } from '../common/utils/clock';
import { BatchSummary } from './event-pipeline.service';
import { WorkerPool } from './worker-pool';

export enum PollerState {
  IDLE = 'IDLE',
  POLLING = 'POLLING',
  BACKOFF = 'BACKOFF',
  AUTH_FAILED = 'AUTH_FAILED',
  STOPPED = 'STOPPED',
}

export interface PollerStatus {
  merchantId: string;
  state: PollerState;
  lastPolledAt: string | null;
  lastSuccessAt: string | null;
  lastError: string | null;
  consecutiveFailures: number;
  skippedTicks: number;
  running: boolean;
  lastSummary: Omit<BatchSummary, 'results'> | null;
}

export interface MerchantPollerDeps {
  intervalMs: number;
  pool: WorkerPool;
  clock: Clock;
  cycle: (merchantId: string) => Promise<BatchSummary>;
  onAuthFailure: (merchantId: string, error: AuthError) => Promise<void>;
}

/**
 * Fixed-interval scheduler for one merchant. A tick that fires while the
 * previous cycle is still queued or running is skipped, never queued.
 */
export class MerchantPoller {
  private readonly logger = new Logger(MerchantPoller.name);
  private timer: NodeJS.Timeout | null = null;
  private inflight: Promise<void> | null = null;
  private state = PollerState.IDLE;
  private lastPolledAt: number | null = null;
  private lastSuccessAt: number | null = null;
  private lastError: string | null = null;
  private consecutiveFailures = 0;
  private skippedTicks = 0;
  private lastSummary: Omit<BatchSummary, 'results'> | null = null;

  constructor(
    readonly merchantId: string,
    private readonly deps: MerchantPollerDeps,
  ) {}

  /** Runs a first cycle right away, then one per interval. */
  start() {
    if (this.timer) return;
    this.state = PollerState.IDLE;
    this.timer = setInterval(() => {
      this.tick();
    }, this.deps.intervalMs);
    this.timer.unref();
    this.tick();
  }

  /** Clears the timer; an in-flight cycle is left to finish. */
  async stop(state: PollerState.STOPPED | PollerState.AUTH_FAILED = PollerState.STOPPED) {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.state = state;
    if (this.inflight) await this.inflight;
  }

  get scheduled() {
    return this.timer !== null;
  }

  /** Starts a cycle, or returns null when this tick is skipped. */
  tick(): Promise<void> | null {
    if (this.state === PollerState.STOPPED || this.state === PollerState.AUTH_FAILED) {
      return null;
    }
    if (this.inflight) {
      this.skippedTicks += 1;
      this.logger.warn({ msg: 'Poll tick skipped; previous cycle still running', merchantId: this.merchantId });
      return null;
    }
    const run = this.deps.pool.run(() => this.cycle());
    this.inflight = run.finally(() => {
      this.inflight = null;
    });
    return this.inflight;
  }

  /** Resolves when the current cycle, if any, settles. */
  async settled() {
    if (this.inflight) await this.inflight;
  }

  status(): PollerStatus {
    const iso = (value: number | null) => (value === null ? null : new Date(value).toISOString());
    return {
      merchantId: this.merchantId,
      state: this.state,
      lastPolledAt: iso(this.lastPolledAt),
      lastSuccessAt: iso(this.lastSuccessAt),
      lastError: this.lastError,
      consecutiveFailures: this.consecutiveFailures,
      skippedTicks: this.skippedTicks,
      running: this.inflight !== null,
      lastSummary: this.lastSummary,
    };
  }

  private async cycle() {
    if (this.state === PollerState.STOPPED || this.state === PollerState.AUTH_FAILED) return;
    this.state = PollerState.POLLING;
    this.lastPolledAt = this.deps.clock.now();
    try {
      const { results: _results, ...summary } = await this.deps.cycle(this.merchantId);
      this.lastSummary = summary;
      this.lastSuccessAt = this.deps.clock.now();
      this.lastError = null;
      this.consecutiveFailures = 0;
      if (this.state === PollerState.POLLING) this.state = PollerState.IDLE;
    } catch (err) {
      this.lastError = errorMessage(err);
      this.consecutiveFailures += 1;
      if (err instanceof AuthError) {
        this.logger.error({ msg: 'Marketplace credentials rejected; poller stopped', merchantId: this.merchantId });
        if (this.timer) {
          clearInterval(this.timer);
          this.timer = null;
        }
        this.state = PollerState.AUTH_FAILED;
        await this.deps.onAuthFailure(this.merchantId, err).catch((notifyErr: unknown) =>
          this.logger.error({ msg: 'Auth failure alert failed', merchantId: this.merchantId, error: errorMessage(notifyErr) }),
        );
        return;
      }
      if (this.state === PollerState.POLLING) this.state = PollerState.BACKOFF;
      this.logger.warn({
        msg: 'Poll cycle failed; retrying next tick',
        merchantId: this.merchantId,
        consecutiveFailures: this.consecutiveFailures,
        error: this.lastError,
      });
    }
  }
}
