import { Logger, Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { ConfigService } from '@nestjs/config';
import * as dotenv from 'dotenv';
import { EventDeliveryProcessor } from './event-delivery.processor';
import { EventPublisher } from './event-publisher.service';
import { EVENT_BUS_QUEUE } from './events.types';

// Ensure .env is loaded before evaluating the flag
dotenv.config();

const redisEnabled = (process.env.REDIS_ENABLED ?? 'true') !== 'false';

if (!redisEnabled) {
  new Logger('EventBusQueue').warn('Event bus queue disabled (REDIS_ENABLED=false); events will be delivered inline');
}

const queueImports = redisEnabled
  ? [
      BullModule.forRootAsync({
        inject: [ConfigService],
        useFactory: (config: ConfigService) => {
          const redisUrl = config.get<string>('REDIS_URL');
          const connection = redisUrl
            ? { url: redisUrl }
            : {
                host: config.get<string>('REDIS_HOST') ?? '127.0.0.1',
                port: Number(config.get('REDIS_PORT') ?? 6379),
              };
          return {
            connection,
            defaultJobOptions: {
              attempts: 5,
              backoff: { type: 'exponential', delay: 2000 },
              removeOnComplete: 100,
              removeOnFail: 500,
            },
          };
        },
      }),
      BullModule.registerQueue({
        name: EVENT_BUS_QUEUE,
      }),
    ]
  : [];

@Module({
  imports: [...queueImports],
  providers: [EventPublisher, EventDeliveryProcessor],
  exports: [EventPublisher],
})
export class EventsModule {}
