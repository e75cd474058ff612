export const EVENT_BUS_QUEUE = 'marketplace-events';

/** Envelope handed to the event bus. */
export interface PublishedEvent {
  id: string;
  topic: string;
  occurredAt: string;
  correlationId?: string;
  merchantId?: string;
  payload: Record<string, unknown>;
}

export type DeliveryResult = 'delivered' | 'skipped';
