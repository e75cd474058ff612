import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { CLOCK, Clock } from '../common/utils/clock';
import { UpstreamRequestError } from '../common/errors';
import {
  CancellationReason,
  MerchantStatusReport,
  MerchantStatusState,
  ItemAvailabilityInput,
  OpeningShift,
  PickingItemInput,
  RawEvent,
  SalesSummary,
} from './marketplace.types';
import { MarketplaceHttpClient } from './transport/marketplace-http.client';

export const ENDPOINTS = {
  polling: '/order/v1.0/events:polling',
  acknowledgment: '/order/v1.0/events/acknowledgment',
  orderDetails: '/order/v1.0/orders/:orderId',
  confirm: '/order/v1.0/orders/:orderId/confirm',
  startPreparation: '/order/v1.0/orders/:orderId/startPreparation',
  readyToPickup: '/order/v1.0/orders/:orderId/readyToPickup',
  dispatch: '/order/v1.0/orders/:orderId/dispatch',
  cancellationReasons: '/order/v1.0/orders/:orderId/cancellationReasons',
  requestCancellation: '/order/v1.0/orders/:orderId/requestCancellation',
  startSeparation: '/picking/v1.0/orders/:orderId/startSeparation',
  endSeparation: '/picking/v1.0/orders/:orderId/endSeparation',
  pickingItems: '/picking/v1.0/orders/:orderId/items',
  pickingItem: '/picking/v1.0/orders/:orderId/items/:uniqueId',
  merchantStatus: '/merchant/v1.0/merchants/:merchantId/status',
  openingHours: '/merchant/v1.0/merchants/:merchantId/opening-hours',
  sales: '/financial/v1.0/merchants/:merchantId/sales',
  itemIngestion: '/item/v1.0/ingestion/:merchantId',
} as const;

export type OrderAction = 'confirm' | 'startPreparation' | 'readyToPickup' | 'dispatch';

const POLLING_SLA_MS = 5_000;
const CONFIRMATION_SLA_MS = 2_000;
const PROCESSING_SLA_MS = 1_000;

const eventSchema = z
  .object({
    id: z.string().min(1),
    code: z.string().optional(),
    fullCode: z.string().optional(),
    type: z.string().optional(),
    orderId: z.string().optional(),
    merchantId: z.string().optional(),
    createdAt: z.string().optional(),
  })
  .passthrough();

const reasonSchema = z
  .object({
    cancelCodeId: z.union([z.string(), z.number()]).optional(),
    code: z.union([z.string(), z.number()]).optional(),
    description: z.string().default(''),
    category: z.string().optional(),
  })
  .passthrough();

const statusEntrySchema = z
  .object({
    state: z.string().optional(),
    available: z.boolean().optional(),
    unavailabilityReason: z.string().optional(),
    validations: z
      .array(
        z
          .object({
            code: z.string().optional(),
            state: z.string().optional(),
            message: z.object({ title: z.string().optional(), description: z.string().optional() }).passthrough().optional(),
          })
          .passthrough(),
      )
      .optional(),
    message: z.object({ title: z.string().optional(), subtitle: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

const openingHoursSchema = z
  .object({
    shifts: z
      .array(
        z
          .object({
            dayOfWeek: z.string(),
            start: z.string(),
            duration: z.coerce.number().optional(),
          })
          .passthrough(),
      )
      .default([]),
  })
  .passthrough();

const salesSchema = z.object({
  sales: z
    .object({
      totalRevenue: z.coerce.number().default(0),
      totalOrders: z.coerce.number().int().nonnegative().default(0),
      topItems: z
        .array(z.object({ name: z.string(), quantity: z.coerce.number(), revenue: z.coerce.number() }).passthrough())
        .default([]),
    })
    .passthrough(),
});

const STATE_SEVERITY: Record<MerchantStatusState, number> = { OK: 0, WARNING: 1, CLOSED: 2, ERROR: 3 };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toStatusState(value: string | undefined, available?: boolean): MerchantStatusState {
  const normalized = (value ?? '').toUpperCase();
  if (normalized === 'OK' || normalized === 'AVAILABLE') return 'OK';
  if (normalized === 'WARNING' || normalized === 'BUSY') return 'WARNING';
  if (normalized === 'CLOSED' || normalized === 'UNAVAILABLE' || normalized === 'OFFLINE') return 'CLOSED';
  if (normalized === 'ERROR') return 'ERROR';
  if (available === true) return 'OK';
  if (available === false) return 'CLOSED';
  return 'ERROR';
}

/** Typed calls to the marketplace merchant API, one method per upstream operation. */
@Injectable()
export class MarketplaceApiService {
  private readonly logger = new Logger(MarketplaceApiService.name);

  constructor(
    private readonly http: MarketplaceHttpClient,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Every entry with an id is returned, including ones owned by another
   * merchant: the poll that delivered an entry must also receipt it.
   */
  async pollEvents(merchantId: string): Promise<RawEvent[]> {
    const response = await this.http.send<unknown>({
      method: 'GET',
      endpoint: ENDPOINTS.polling,
      merchantId,
      headers: { 'x-polling-merchants': merchantId },
      slaMs: POLLING_SLA_MS,
    });
    if (response.status === 204 || response.data === '' || response.data === null || response.data === undefined) {
      return [];
    }
    const entries = isRecord(response.data) && Array.isArray(response.data.events) ? response.data.events : response.data;
    if (!Array.isArray(entries)) {
      throw new UpstreamRequestError(ENDPOINTS.polling, response.status, response.data);
    }

    const receivedAt = this.clock.now();
    const events: RawEvent[] = [];
    for (const entry of entries) {
      const parsed = eventSchema.safeParse(entry);
      if (!parsed.success) {
        this.logger.error({ msg: 'Polled event without id; cannot acknowledge or deduplicate', merchantId, entry });
        continue;
      }
      const event = parsed.data;
      events.push({
        eventId: event.id,
        merchantId: event.merchantId ?? merchantId,
        orderId: event.orderId,
        eventType: event.fullCode ?? event.code ?? event.type ?? 'UNKNOWN',
        payload: { ...event },
        createdAt: event.createdAt,
        receivedAt,
      });
    }
    return events;
  }

  async acknowledgeEvents(merchantId: string, eventIds: string[]): Promise<void> {
    await this.http.send({
      method: 'POST',
      endpoint: ENDPOINTS.acknowledgment,
      merchantId,
      body: eventIds.map((id) => ({ id })),
      slaMs: PROCESSING_SLA_MS,
      retry: false,
    });
  }

  async getOrderDetails(merchantId: string, orderId: string): Promise<unknown> {
    const response = await this.http.send<unknown>({
      method: 'GET',
      endpoint: ENDPOINTS.orderDetails,
      params: { orderId },
      merchantId,
      slaMs: POLLING_SLA_MS,
    });
    return response.data;
  }

  async postOrderAction(merchantId: string, orderId: string, action: OrderAction): Promise<void> {
    await this.http.send({
      method: 'POST',
      endpoint: ENDPOINTS[action],
      params: { orderId },
      merchantId,
      slaMs: CONFIRMATION_SLA_MS,
    });
  }

  async getCancellationReasons(merchantId: string, orderId: string): Promise<CancellationReason[]> {
    const response = await this.http.send<unknown>({
      method: 'GET',
      endpoint: ENDPOINTS.cancellationReasons,
      params: { orderId },
      merchantId,
      slaMs: POLLING_SLA_MS,
    });
    if (response.status === 204) return [];
    const entries = isRecord(response.data) && Array.isArray(response.data.reasons) ? response.data.reasons : response.data;
    if (!Array.isArray(entries)) {
      throw new UpstreamRequestError(ENDPOINTS.cancellationReasons, response.status, response.data);
    }
    const reasons: CancellationReason[] = [];
    for (const entry of entries) {
      const parsed = reasonSchema.safeParse(entry);
      const code = parsed.success ? parsed.data.cancelCodeId ?? parsed.data.code : undefined;
      if (!parsed.success || code === undefined) {
        this.logger.warn({ msg: 'Unreadable cancellation reason skipped', merchantId, orderId, entry });
        continue;
      }
      reasons.push({ code: String(code), description: parsed.data.description, category: parsed.data.category });
    }
    return reasons;
  }

  async requestCancellation(merchantId: string, orderId: string, reason: CancellationReason): Promise<void> {
    await this.http.send({
      method: 'POST',
      endpoint: ENDPOINTS.requestCancellation,
      params: { orderId },
      merchantId,
      body: { reason: reason.description, cancellationCode: reason.code },
      slaMs: CONFIRMATION_SLA_MS,
    });
  }

  async startSeparation(merchantId: string, orderId: string): Promise<void> {
    await this.http.send({
      method: 'POST',
      endpoint: ENDPOINTS.startSeparation,
      params: { orderId },
      merchantId,
      slaMs: CONFIRMATION_SLA_MS,
    });
  }

  async endSeparation(merchantId: string, orderId: string): Promise<void> {
    await this.http.send({
      method: 'POST',
      endpoint: ENDPOINTS.endSeparation,
      params: { orderId },
      merchantId,
      slaMs: CONFIRMATION_SLA_MS,
    });
  }

  async addPickingItem(merchantId: string, orderId: string, item: PickingItemInput): Promise<void> {
    await this.http.send({
      method: 'POST',
      endpoint: ENDPOINTS.pickingItems,
      params: { orderId },
      merchantId,
      body: item,
    });
  }

  async modifyPickingItem(merchantId: string, orderId: string, uniqueId: string, changes: PickingItemInput): Promise<void> {
    await this.http.send({
      method: 'PATCH',
      endpoint: ENDPOINTS.pickingItem,
      params: { orderId, uniqueId },
      merchantId,
      body: changes,
    });
  }

  async removePickingItem(merchantId: string, orderId: string, uniqueId: string): Promise<void> {
    await this.http.send({
      method: 'DELETE',
      endpoint: ENDPOINTS.pickingItem,
      params: { orderId, uniqueId },
      merchantId,
    });
  }

  async getMerchantStatus(merchantId: string): Promise<MerchantStatusReport> {
    const response = await this.http.send<unknown>({
      method: 'GET',
      endpoint: ENDPOINTS.merchantStatus,
      params: { merchantId },
      merchantId,
      slaMs: POLLING_SLA_MS,
    });
    const entries = Array.isArray(response.data) ? response.data : [response.data];
    let state: MerchantStatusState = 'OK';
    const reasons: string[] = [];
    let readable = 0;
    for (const entry of entries) {
      const parsed = statusEntrySchema.safeParse(entry);
      if (!parsed.success) continue;
      readable += 1;
      const entryState = toStatusState(parsed.data.state, parsed.data.available);
      if (STATE_SEVERITY[entryState] > STATE_SEVERITY[state]) state = entryState;
      if (parsed.data.unavailabilityReason) reasons.push(parsed.data.unavailabilityReason);
      for (const validation of parsed.data.validations ?? []) {
        if (toStatusState(validation.state) === 'OK') continue;
        const text = validation.message?.title ?? validation.message?.description ?? validation.code;
        if (text) reasons.push(text);
      }
      if (entryState !== 'OK' && parsed.data.message?.title) reasons.push(parsed.data.message.title);
    }
    if (readable === 0) {
      throw new UpstreamRequestError(ENDPOINTS.merchantStatus, response.status, response.data);
    }
    return { state, unavailabilityReasons: [...new Set(reasons)], raw: response.data };
  }

  async getOpeningHours(merchantId: string): Promise<OpeningShift[]> {
    const response = await this.http.send<unknown>({
      method: 'GET',
      endpoint: ENDPOINTS.openingHours,
      params: { merchantId },
      merchantId,
    });
    const parsed = openingHoursSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new UpstreamRequestError(ENDPOINTS.openingHours, response.status, response.data);
    }
    return parsed.data.shifts.map((shift) => ({
      dayOfWeek: shift.dayOfWeek,
      start: shift.start,
      durationMinutes: shift.duration ?? 0,
    }));
  }

  async getSales(merchantId: string, range: { startDate: string; endDate: string }): Promise<SalesSummary> {
    const response = await this.http.send<unknown>({
      method: 'GET',
      endpoint: ENDPOINTS.sales,
      params: { merchantId },
      query: range,
      merchantId,
      slaMs: POLLING_SLA_MS,
    });
    const parsed = salesSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new UpstreamRequestError(ENDPOINTS.sales, response.status, response.data);
    }
    const { totalRevenue, totalOrders, topItems } = parsed.data.sales;
    return {
      ...range,
      totalRevenue,
      totalOrders,
      averageTicket: totalOrders > 0 ? Math.round((totalRevenue / totalOrders) * 100) / 100 : 0,
      topItems: topItems.map((item) => ({ name: item.name, quantity: item.quantity, revenue: item.revenue })),
    };
  }

  /** Partial catalog ingestion; items not listed keep their current availability. */
  async updateItemAvailability(merchantId: string, items: ItemAvailabilityInput[]): Promise<void> {
    await this.http.send({
      method: 'POST',
      endpoint: ENDPOINTS.itemIngestion,
      params: { merchantId },
      query: { reset: false },
      merchantId,
      body: {
        items: items.map((item) => ({
          name: item.name,
          availability: item.quantity > 0,
          quantity: item.quantity > 0 ? item.quantity : null,
        })),
      },
      slaMs: CONFIRMATION_SLA_MS,
    });
  }
}
