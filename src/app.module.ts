import { Logger, Module } from '@nestjs/common';
import Redis from 'ioredis';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { CacheModule } from '@nestjs/cache-manager';
import { LoggerModule } from 'nestjs-pino';
import { redisInsStore } from 'cache-manager-ioredis-yet';
import { TerminusModule } from '@nestjs/terminus';
import { CommonModule } from './common/common.module';
import { errorMessage } from './common/errors';
import { validateEnv } from './config/env.validation';
import { EventsModule } from './events/events.module';
import { HealthController } from './health/health.controller';
import { IngestionModule } from './ingestion/ingestion.module';
import { MarketplaceModule } from './marketplace/marketplace.module';
import { MerchantsModule } from './merchants/merchants.module';
import { OpsModule } from './ops/ops.module';
import { OrdersModule } from './orders/orders.module';
import { PickingModule } from './picking/picking.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv, expandVariables: true }),
    TerminusModule,
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        pinoHttp: {
          level: config.get<string>('LOG_LEVEL') || (config.get('NODE_ENV') === 'production' ? 'info' : 'debug'),
          redact: ['req.headers.authorization', 'req.headers["x-internal-secret"]'],
          transport:
            config.get('NODE_ENV') !== 'production'
              ? {
                  target: 'pino-pretty',
                  options: { colorize: true, singleLine: true },
                }
              : undefined,
        },
      }),
    }),
    CacheModule.registerAsync({
      isGlobal: true,
      inject: [ConfigService],
      useFactory: async (config: ConfigService) => {
        const logger = new Logger('Cache');
        const ttl = Number(config.get('CACHE_DEFAULT_TTL_MS') ?? 60_000);
        const redisEnabled = (config.get<string>('REDIS_ENABLED') ?? 'true') !== 'false';
        const redisUrl = redisEnabled ? config.get<string>('REDIS_URL') : undefined;

        if (redisEnabled && redisUrl) {
          const client = new Redis(redisUrl, {
            lazyConnect: true,
            maxRetriesPerRequest: 0,
            enableOfflineQueue: false,
            retryStrategy: () => null,
          });
          client.on('error', (err: Error) => logger.warn(`Redis cache error: ${err.message}`));
          try {
            await client.connect();
            const store = redisInsStore(client, { ttl });
            logger.log(`Cache connected to Redis at ${redisUrl}`);
            return { store };
          } catch (err) {
            logger.warn(`Redis cache disabled (connection failed): ${errorMessage(err)}`);
            client.disconnect();
          }
        } else if (!redisEnabled) {
          logger.warn('Redis cache disabled via REDIS_ENABLED=false');
        }

        return { ttl };
      },
    }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => [
        {
          ttl: Number(config.get('RATE_LIMIT_TTL') ?? 60) * 1000,
          limit: Number(config.get('RATE_LIMIT_MAX') ?? 100),
        },
      ],
    }),
    CommonModule,
    EventsModule,
    OpsModule,
    MarketplaceModule,
    OrdersModule,
    PickingModule,
    IngestionModule,
    MerchantsModule,
  ],
  controllers: [HealthController],
  providers: [{ provide: APP_GUARD, useClass: ThrottlerGuard }],
})
export class AppModule {}
