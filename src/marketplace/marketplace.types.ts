export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export interface MerchantCredentials {
  clientId: string;
  clientSecret: string;
}

/** Bearer credential held by the token manager. Times are epoch milliseconds. */
export interface Credential {
  accessToken: string;
  issuedAt: number;
  expiresAt: number;
  refreshToken?: string;
  refreshExpiresAt?: number;
}

/** Polled event, immutable once received. */
export interface RawEvent {
  eventId: string;
  merchantId: string;
  orderId?: string;
  eventType: string;
  payload: Record<string, unknown>;
  createdAt?: string;
  receivedAt: number;
}

export interface CancellationReason {
  code: string;
  description: string;
  category?: string;
}

export type MerchantStatusState = 'OK' | 'WARNING' | 'CLOSED' | 'ERROR';

export interface MerchantStatusReport {
  state: MerchantStatusState;
  unavailabilityReasons: string[];
  raw: unknown;
}

export interface OpeningShift {
  dayOfWeek: string;
  start: string;
  durationMinutes: number;
}

export interface PickingItemInput {
  productId?: string;
  uniqueId?: string;
  quantity?: number;
  unitPrice?: number;
  replacedUniqueId?: string;
}

export type SalesPeriod = 'today' | 'week' | 'month';

export interface SalesTopItem {
  name: string;
  quantity: number;
  revenue: number;
}

export interface SalesSummary {
  startDate: string;
  endDate: string;
  totalRevenue: number;
  totalOrders: number;
  averageTicket: number;
  topItems: SalesTopItem[];
}

/** Quantity 0 marks the item unavailable. */
export interface ItemAvailabilityInput {
  name: string;
  quantity: number;
}
