import { HttpStatus, Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RequestContextService } from '../common/context/request-context.service';
import { DomainError, ErrorCode } from '../common/errors';
import { CLOCK, Clock } from '../common/utils/clock';
import { MarketplaceApiService } from '../marketplace/marketplace-api.service';
import { OpsAlertService } from '../ops/ops-alert.service';
import { EventPipelineService } from './event-pipeline.service';
import { MerchantPoller, PollerState, PollerStatus } from './merchant-poller';
import { WorkerPool } from './worker-pool';

export class MerchantNotRegistered extends DomainError {
  constructor(merchantId: string) {
    super(ErrorCode.NOT_FOUND, `Merchant ${merchantId} is not registered for polling`, HttpStatus.NOT_FOUND, {
      merchantId,
    });
    this.name = 'MerchantNotRegistered';
  }
}

@Injectable()
export class PollerRegistry implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(PollerRegistry.name);
  private readonly pollers = new Map<string, MerchantPoller>();
  private readonly pool: WorkerPool;
  private readonly intervalMs: number;
  private readonly enabled: boolean;

  constructor(
    private readonly config: ConfigService,
    private readonly api: MarketplaceApiService,
    private readonly pipeline: EventPipelineService,
    private readonly ops: OpsAlertService,
    private readonly context: RequestContextService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.intervalMs = Number(this.config.get('POLL_INTERVAL_MS') ?? 30_000);
    this.pool = new WorkerPool(Number(this.config.get('POLL_CONCURRENCY') ?? 10));
    this.enabled = String(this.config.get('POLLER_ENABLED') ?? 'true') !== 'false';
  }

  onModuleInit() {
    if (!this.enabled) {
      this.logger.warn('Merchant pollers disabled via POLLER_ENABLED');
      return;
    }
    const merchants = String(this.config.get('POLL_MERCHANTS') ?? '')
      .split(',')
      .map((id) => id.trim())
      .filter(Boolean);
    for (const merchantId of merchants) this.registerMerchant(merchantId);
    this.logger.log({ msg: 'Merchant pollers starting', merchants, intervalMs: this.intervalMs, concurrency: this.pool.concurrency });
  }

  async onModuleDestroy() {
    await Promise.all([...this.pollers.values()].map((poller) => poller.stop()));
  }

  /** Idempotent. Re-registering a stopped or auth-failed merchant restarts it. */
  registerMerchant(merchantId: string): PollerStatus {
    const existing = this.pollers.get(merchantId);
    if (existing) {
      const { state } = existing.status();
      if (state === PollerState.AUTH_FAILED || state === PollerState.STOPPED) {
        this.pollers.delete(merchantId);
      } else {
        return existing.status();
      }
    }
    const poller = new MerchantPoller(merchantId, {
      intervalMs: this.intervalMs,
      pool: this.pool,
      clock: this.clock,
      cycle: (id) => this.runCycle(id),
      onAuthFailure: (id, error) =>
        this.ops.notifyOperator('critical', 'Marketplace credentials rejected; merchant polling stopped', {
          merchantId: id,
          error: error.message,
        }),
    });
    this.pollers.set(merchantId, poller);
    if (this.enabled) poller.start();
    this.logger.log({ msg: 'Merchant registered for polling', merchantId, scheduled: this.enabled });
    return poller.status();
  }

  /** Stops the schedule; an in-flight cycle finishes first. */
  async deregisterMerchant(merchantId: string): Promise<boolean> {
    const poller = this.pollers.get(merchantId);
    if (!poller) return false;
    this.pollers.delete(merchantId);
    await poller.stop();
    this.logger.log({ msg: 'Merchant deregistered', merchantId });
    return true;
  }

  /** Runs a cycle now, or waits for the one already running. */
  async pollNow(merchantId: string): Promise<PollerStatus> {
    const poller = this.require(merchantId);
    const cycle = poller.tick();
    if (cycle) {
      await cycle;
    } else {
      await poller.settled();
    }
    return poller.status();
  }

  status(merchantId: string): PollerStatus | null {
    return this.pollers.get(merchantId)?.status() ?? null;
  }

  statuses(): PollerStatus[] {
    return [...this.pollers.values()].map((poller) => poller.status());
  }

  private runCycle(merchantId: string) {
    return this.context.run(
      async () => {
        const events = await this.api.pollEvents(merchantId);
        return this.pipeline.processBatch(merchantId, events);
      },
      { source: 'poller', merchantId },
    );
  }

  private require(merchantId: string): MerchantPoller {
    const poller = this.pollers.get(merchantId);
    if (!poller) throw new MerchantNotRegistered(merchantId);
    return poller;
  }
}
