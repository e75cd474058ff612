import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { CLOCK, Clock } from '../common/utils/clock';
import { errorMessage } from '../common/errors';
import { EventsModule } from '../events/events.module';
import { MarketplaceModule } from '../marketplace/marketplace.module';
import { OpsModule } from '../ops/ops.module';
import { OrdersModule } from '../orders/orders.module';
import { AcknowledgmentService } from './acknowledgment.service';
import { DEDUP_STORE, DedupStore, MemoryDedupStore, RedisDedupStore } from './dedup.store';
import { DeduplicatorService } from './deduplicator.service';
import { EventPipelineService } from './event-pipeline.service';
import { PollerRegistry } from './poller.registry';

async function createDedupStore(config: ConfigService, clock: Clock): Promise<DedupStore> {
  const logger = new Logger('DedupStore');
  const redisEnabled = (config.get<string>('REDIS_ENABLED') ?? 'true') !== 'false';
  const redisUrl = redisEnabled ? config.get<string>('REDIS_URL') : undefined;

  if (redisEnabled && redisUrl) {
    const client = new Redis(redisUrl, {
      lazyConnect: true,
      maxRetriesPerRequest: 1,
      enableOfflineQueue: false,
    });
    client.on('error', (err: Error) => logger.warn(`Redis dedup error: ${err.message}`));
    try {
      await client.connect();
      logger.log(`Dedup store connected to Redis at ${redisUrl}`);
      return new RedisDedupStore(client);
    } catch (err) {
      logger.warn(`Redis dedup store unavailable, using memory (single instance only): ${errorMessage(err)}`);
      client.disconnect();
    }
  } else if (!redisEnabled) {
    logger.warn('Redis dedup store disabled via REDIS_ENABLED=false');
  }

  return new MemoryDedupStore(() => clock.now());
}

@Module({
  imports: [MarketplaceModule, OrdersModule, EventsModule, OpsModule],
  providers: [
    {
      provide: DEDUP_STORE,
      inject: [ConfigService, CLOCK],
      useFactory: createDedupStore,
    },
    DeduplicatorService,
    AcknowledgmentService,
    EventPipelineService,
    PollerRegistry,
  ],
  exports: [PollerRegistry, AcknowledgmentService],
})
export class IngestionModule {}
