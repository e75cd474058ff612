import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock } from '../common/utils/clock';
import { AckFailureEscalation, InvalidTransition, ProtocolViolation, errorMessage } from '../common/errors';
import { EventPublisher } from '../events/event-publisher.service';
import { RawEvent } from '../marketplace/marketplace.types';
import { OrdersService } from '../orders/orders.service';
import { AcknowledgmentService } from './acknowledgment.service';
import { DeduplicatorService } from './deduplicator.service';

export type EventOutcome = 'APPLIED' | 'ALREADY_APPLIED' | 'IGNORED' | 'DUPLICATE' | 'REJECTED' | 'FAILED';

export interface EventResult {
  eventId: string;
  orderId?: string;
  eventType: string;
  outcome: EventOutcome;
  error?: string;
}

export interface BatchSummary {
  merchantId: string;
  received: number;
  outcomes: Record<EventOutcome, number>;
  /** Delivered entries whose receipt went through. */
  acknowledged: number;
  escalated: string[];
  results: EventResult[];
}

export const UNMAPPED_EVENT_TOPIC = 'marketplace.event';

const PROCESSING_SLA_MS = 1000;

function emptyOutcomes(): Record<EventOutcome, number> {
  return { APPLIED: 0, ALREADY_APPLIED: 0, IGNORED: 0, DUPLICATE: 0, REJECTED: 0, FAILED: 0 };
}

/**
 * One poll batch: receipts for every delivered event go out concurrently,
 * while events run one by one through dedup and the order state machine.
 * A bad event is classified and logged; it never stops its siblings.
 */
@Injectable()
export class EventPipelineService {
  private readonly logger = new Logger(EventPipelineService.name);

  constructor(
    private readonly dedup: DeduplicatorService,
    private readonly acks: AcknowledgmentService,
    private readonly orders: OrdersService,
    private readonly events: EventPublisher,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async processBatch(merchantId: string, batch: RawEvent[]): Promise<BatchSummary> {
    const summary: BatchSummary = {
      merchantId,
      received: batch.length,
      outcomes: emptyOutcomes(),
      acknowledged: 0,
      escalated: [],
      results: [],
    };
    if (!batch.length) return summary;

    const ids = batch.map((event) => event.eventId);
    const receipts = this.acks.acknowledgeAll(merchantId, ids, { redelivered: true }).then(
      () => null,
      (err: unknown) => err,
    );

    for (const event of batch) {
      const result = await this.process(merchantId, event);
      summary.outcomes[result.outcome] += 1;
      summary.results.push(result);
    }

    const ackError = await receipts;
    if (ackError && !(ackError instanceof AckFailureEscalation)) {
      this.logger.error({ msg: 'Acknowledgment failed unexpectedly', merchantId, error: errorMessage(ackError) });
    }
    summary.acknowledged = ids.filter((eventId) => this.acks.status(eventId)?.acknowledged).length;
    summary.escalated = [...new Set(ids.filter((eventId) => this.acks.status(eventId)?.escalated))];

    this.logger.log({
      msg: 'Poll batch processed',
      merchantId,
      received: summary.received,
      outcomes: summary.outcomes,
      acknowledged: summary.acknowledged,
      escalated: summary.escalated.length,
    });
    return summary;
  }

  private async process(merchantId: string, event: RawEvent): Promise<EventResult> {
    const base = { eventId: event.eventId, orderId: event.orderId, eventType: event.eventType };
    if (event.merchantId !== merchantId) {
      const error = `Event owned by merchant ${event.merchantId} delivered to the poll of ${merchantId}`;
      this.logger.warn({ msg: 'Event rejected', ...base, merchantId, owner: event.merchantId });
      return { ...base, outcome: 'REJECTED', error };
    }
    const startedAt = this.clock.now();
    try {
      if (!(await this.dedup.admit(event.eventId))) {
        return { ...base, outcome: 'DUPLICATE' };
      }
      const applied = await this.orders.applyEvent(event);
      if (applied.outcome === 'IGNORED') {
        await this.events.publish(
          UNMAPPED_EVENT_TOPIC,
          { eventId: event.eventId, orderId: event.orderId, eventType: event.eventType, payload: event.payload },
          { merchantId: event.merchantId },
        );
      }
      return { ...base, outcome: applied.outcome };
    } catch (err) {
      const error = errorMessage(err);
      if (err instanceof InvalidTransition || err instanceof ProtocolViolation) {
        this.logger.warn({ msg: 'Event rejected', ...base, error });
        return { ...base, outcome: 'REJECTED', error };
      }
      this.logger.error({ msg: 'Event processing failed terminally', ...base, error });
      return { ...base, outcome: 'FAILED', error };
    } finally {
      const elapsedMs = this.clock.now() - startedAt;
      if (elapsedMs > PROCESSING_SLA_MS) {
        this.logger.warn({ msg: 'Event processing exceeded SLA', eventId: event.eventId, elapsedMs });
      }
    }
  }
}
