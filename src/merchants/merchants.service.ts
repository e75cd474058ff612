import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheService } from '../common/cache/cache.service';
import { CLOCK, Clock } from '../common/utils/clock';
import { PollerState, PollerStatus } from '../ingestion/merchant-poller';
import { PollerRegistry } from '../ingestion/poller.registry';
import { CREDENTIAL_STORE, CredentialStore } from '../marketplace/credentials/credential-store';
import { MarketplaceApiService } from '../marketplace/marketplace-api.service';
import {
  ItemAvailabilityInput,
  MerchantStatusReport,
  OpeningShift,
  SalesPeriod,
  SalesSummary,
} from '../marketplace/marketplace.types';
import { MarketplaceHttpClient } from '../marketplace/transport/marketplace-http.client';

export interface CachedMerchantStatus extends MerchantStatusReport {
  merchantId: string;
  cachedAt: string;
}

export interface CachedOpeningHours {
  merchantId: string;
  shifts: OpeningShift[];
  cachedAt: string;
}

export interface CachedSalesSummary extends SalesSummary {
  merchantId: string;
  period: SalesPeriod;
  cachedAt: string;
}

export interface ItemAvailabilityUpdate {
  merchantId: string;
  items: { name: string; available: boolean; quantity: number }[];
  updatedAt: string;
}

export interface MerchantHealth {
  merchantId: string;
  degraded: boolean;
  reasons: string[];
  poller: PollerStatus | null;
  openCircuits: string[];
}

const DAY_MS = 24 * 60 * 60 * 1000;
const PERIOD_DAYS: Record<Exclude<SalesPeriod, 'today'>, number> = { week: 7, month: 30 };

const DEGRADED_POLLER_STATES = new Set<PollerState>([PollerState.AUTH_FAILED, PollerState.BACKOFF]);

@Injectable()
export class MerchantsService {
  private readonly logger = new Logger(MerchantsService.name);
  private readonly statusTtlMs: number;
  private readonly availabilityTtlMs: number;
  private readonly salesTtlMs: number;

  constructor(
    private readonly registry: PollerRegistry,
    private readonly api: MarketplaceApiService,
    private readonly http: MarketplaceHttpClient,
    private readonly cache: CacheService,
    private readonly config: ConfigService,
    @Inject(CREDENTIAL_STORE) private readonly credentials: CredentialStore,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.statusTtlMs = Number(this.config.get('MERCHANT_STATUS_CACHE_TTL_MS') ?? 300_000);
    this.availabilityTtlMs = Number(this.config.get('MERCHANT_AVAILABILITY_CACHE_TTL_MS') ?? 3_600_000);
    this.salesTtlMs = Number(this.config.get('SALES_SUMMARY_CACHE_TTL_MS') ?? 300_000);
  }

  list(): PollerStatus[] {
    return this.registry.statuses();
  }

  /** Fails with AuthError when no credentials exist for the merchant. */
  async register(merchantId: string): Promise<PollerStatus> {
    await this.credentials.getMerchantCredentials(merchantId);
    return this.registry.registerMerchant(merchantId);
  }

  async deregister(merchantId: string) {
    const removed = await this.registry.deregisterMerchant(merchantId);
    if (removed) {
      await Promise.all([
        this.cache.del(this.cache.buildKey('merchant-status', merchantId)),
        this.cache.del(this.cache.buildKey('merchant-opening-hours', merchantId)),
        ...(['today', 'week', 'month'] as const).map((period) =>
          this.cache.del(this.cache.buildKey('merchant-sales', merchantId, period)),
        ),
      ]);
    }
    return { merchantId, removed };
  }

  pollNow(merchantId: string) {
    return this.registry.pollNow(merchantId);
  }

  getStatus(merchantId: string): Promise<CachedMerchantStatus> {
    return this.cache.wrap(
      this.cache.buildKey('merchant-status', merchantId),
      async () => ({ merchantId, ...(await this.api.getMerchantStatus(merchantId)), cachedAt: this.timestamp() }),
      this.statusTtlMs,
    );
  }

  getOpeningHours(merchantId: string): Promise<CachedOpeningHours> {
    return this.cache.wrap(
      this.cache.buildKey('merchant-opening-hours', merchantId),
      async () => ({ merchantId, shifts: await this.api.getOpeningHours(merchantId), cachedAt: this.timestamp() }),
      this.availabilityTtlMs,
    );
  }

  /** `today` starts at UTC midnight; `week` and `month` are the trailing 7 and 30 days. */
  getSalesSummary(merchantId: string, period: SalesPeriod = 'today'): Promise<CachedSalesSummary> {
    return this.cache.wrap(
      this.cache.buildKey('merchant-sales', merchantId, period),
      async () => {
        const now = this.clock.now();
        const start = period === 'today' ? now - (now % DAY_MS) : now - PERIOD_DAYS[period] * DAY_MS;
        const range = { startDate: new Date(start).toISOString(), endDate: new Date(now).toISOString() };
        const summary = await this.api.getSales(merchantId, range);
        return { merchantId, period, ...summary, cachedAt: this.timestamp() };
      },
      this.salesTtlMs,
    );
  }

  async updateItemAvailability(merchantId: string, items: ItemAvailabilityInput[]): Promise<ItemAvailabilityUpdate> {
    await this.api.updateItemAvailability(merchantId, items);
    this.logger.log({ msg: 'Item availability updated', merchantId, items: items.length });
    return {
      merchantId,
      items: items.map((item) => ({ name: item.name, available: item.quantity > 0, quantity: item.quantity })),
      updatedAt: this.timestamp(),
    };
  }

  /** Local view only; never calls upstream. */
  getHealth(merchantId: string): MerchantHealth {
    const poller = this.registry.status(merchantId);
    const openCircuits = this.http.openCircuits();
    const reasons: string[] = [];
    if (poller && DEGRADED_POLLER_STATES.has(poller.state)) {
      reasons.push(poller.state === PollerState.AUTH_FAILED ? 'credentials rejected' : 'polling failing');
    }
    if (openCircuits.length) {
      reasons.push(`circuit open: ${openCircuits.join(', ')}`);
    }
    if (reasons.length) {
      this.logger.debug({ msg: 'Merchant degraded', merchantId, reasons });
    }
    return { merchantId, degraded: reasons.length > 0, reasons, poller, openCircuits };
  }

  private timestamp() {
    return new Date(this.clock.now()).toISOString();
  }
}
