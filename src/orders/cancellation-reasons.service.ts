import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheService } from '../common/cache/cache.service';
import { InvalidCancellationReason } from '../common/errors';
import { MarketplaceApiService } from '../marketplace/marketplace-api.service';
import { CancellationReason } from '../marketplace/marketplace.types';

@Injectable()
export class CancellationReasonsService {
  private readonly ttlMs: number;

  constructor(
    private readonly api: MarketplaceApiService,
    private readonly cache: CacheService,
    private readonly config: ConfigService,
  ) {
    this.ttlMs = Number(this.config.get('CANCELLATION_REASONS_CACHE_TTL_MS') ?? 3_600_000);
  }

  list(merchantId: string, orderId: string): Promise<CancellationReason[]> {
    return this.cache.wrap(
      this.cache.buildKey('cancellation-reasons', orderId),
      () => this.api.getCancellationReasons(merchantId, orderId),
      this.ttlMs,
    );
  }

  /** The offered reason with this code; anything else is rejected before cancellation is requested. */
  async resolve(merchantId: string, orderId: string, reasonCode: string): Promise<CancellationReason> {
    const reasons = await this.list(merchantId, orderId);
    const match = reasons.find((reason) => reason.code === reasonCode);
    if (!match) {
      throw new InvalidCancellationReason(
        orderId,
        reasonCode,
        reasons.map((reason) => reason.code),
      );
    }
    return match;
  }

  async invalidate(orderId: string) {
    await this.cache.del(this.cache.buildKey('cancellation-reasons', orderId));
  }
}
