import { Controller, Get, Head, Inject, Logger, UseGuards } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiHeader, ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { HealthCheck, HealthCheckService, HealthIndicatorResult } from '@nestjs/terminus';
import { Queue } from 'bullmq';
import Redis from 'ioredis';
import { version as nodeVersion } from 'process';
import { CacheService } from '../common/cache/cache.service';
import { ERROR_CODES } from '../common/errors';
import { InternalSecretGuard } from '../common/guards/internal-secret.guard';
import { CLOCK, Clock } from '../common/utils/clock';
import { EVENT_BUS_QUEUE } from '../events/events.types';
import { PollerState } from '../ingestion/merchant-poller';
import { PollerRegistry } from '../ingestion/poller.registry';
import { MarketplaceHttpClient } from '../marketplace/transport/marketplace-http.client';

@ApiTags('System')
@Controller({ path: '', version: '1' })
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly health: HealthCheckService,
    private readonly config: ConfigService,
    private readonly cache: CacheService,
    private readonly pollers: PollerRegistry,
    private readonly http: MarketplaceHttpClient,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  private redisEnabled() {
    return (this.config.get<string>('REDIS_ENABLED') ?? 'true') !== 'false';
  }

  private async redisCheck(): Promise<HealthIndicatorResult> {
    if (!this.redisEnabled()) return { redis: { status: 'up', message: 'disabled' } };
    const redisUrl = this.config.get<string>('REDIS_URL');
    if (!redisUrl) return { redis: { status: 'down', message: 'REDIS_URL missing' } };
    const client = new Redis(redisUrl, { lazyConnect: true });
    try {
      await client.connect();
      await client.ping();
      return { redis: { status: 'up' } };
    } finally {
      client.disconnect();
    }
  }

  private async queueCheck(): Promise<HealthIndicatorResult> {
    if (!this.redisEnabled()) return { eventBusQueue: { status: 'up', message: 'inline delivery' } };
    const redisUrl = this.config.get<string>('REDIS_URL');
    if (!redisUrl) return { eventBusQueue: { status: 'down', message: 'REDIS_URL missing' } };
    const queue = new Queue(EVENT_BUS_QUEUE, { connection: { url: redisUrl } });
    try {
      const counts = await queue.getJobCounts('waiting', 'active', 'delayed', 'failed');
      return { eventBusQueue: { status: 'up', ...counts } };
    } finally {
      await queue.close();
    }
  }

  /** Degraded merchants are reported in the details; the connector itself stays up. */
  connectorCheck(): HealthIndicatorResult {
    const statuses = this.pollers.statuses();
    const openCircuits = this.http.openCircuits();
    const degraded = statuses
      .filter((status) => status.state === PollerState.AUTH_FAILED || status.state === PollerState.BACKOFF)
      .map((status) => ({ merchantId: status.merchantId, state: status.state, lastError: status.lastError }));
    if (degraded.length || openCircuits.length) {
      this.logger.warn({ msg: 'Connector degraded', degraded, openCircuits });
    }
    return {
      connector: {
        status: 'up',
        merchants: statuses.length,
        degraded,
        openCircuits,
      },
    };
  }

  @Get('health')
  @HealthCheck()
  async healthcheck() {
    return this.health.check([() => this.redisCheck(), () => this.queueCheck(), () => this.connectorCheck()]);
  }

  @Get('monitnow')
  @Head('monitnow')
  monitorProbe() {
    return { ok: true };
  }

  @Get('metrics')
  @ApiHeader({ name: 'x-internal-secret', required: true })
  @UseGuards(InternalSecretGuard)
  metrics() {
    const mem = process.memoryUsage();
    return {
      uptimeSeconds: Math.round(process.uptime()),
      timestamp: new Date(this.clock.now()).toISOString(),
      node: nodeVersion,
      memory: {
        rss: mem.rss,
        heapUsed: mem.heapUsed,
        heapTotal: mem.heapTotal,
      },
      cache: this.cache.stats(),
      pollers: this.pollers.statuses(),
      circuits: this.http.breakerSnapshots(),
    };
  }

  @Get('system/error-codes')
  @ApiOkResponse({ description: 'List of shared API error codes' })
  errorCodes() {
    return ERROR_CODES;
  }
}
