import { InjectQueue } from '@nestjs/bullmq';
import { Inject, Injectable, Logger, OnApplicationShutdown, Optional } from '@nestjs/common';
import { Queue } from 'bullmq';
import { randomUUID } from 'crypto';
import { RequestContextService } from '../common/context/request-context.service';
import { CLOCK, Clock } from '../common/utils/clock';
import { errorMessage } from '../common/errors';
import { EventDeliveryProcessor } from './event-delivery.processor';
import { EVENT_BUS_QUEUE, PublishedEvent } from './events.types';

export interface PublishOptions {
  merchantId?: string;
}

/**
 * Producer side of the event bus. Publishing never throws into callers;
 * failures are logged and the call resolves to null.
 */
@Injectable()
export class EventPublisher implements OnApplicationShutdown {
  private readonly logger = new Logger(EventPublisher.name);
  private readonly pending = new Set<Promise<unknown>>();

  constructor(
    private readonly context: RequestContextService,
    private readonly processor: EventDeliveryProcessor,
    @Inject(CLOCK) private readonly clock: Clock,
    @InjectQueue(EVENT_BUS_QUEUE) @Optional() private readonly queue?: Queue,
  ) {}

  async publish(topic: string, payload: Record<string, unknown>, options: PublishOptions = {}): Promise<PublishedEvent | null> {
    const event: PublishedEvent = {
      id: randomUUID(),
      topic,
      occurredAt: new Date(this.clock.now()).toISOString(),
      correlationId: this.context.get('correlationId'),
      merchantId: options.merchantId ?? this.context.get('merchantId'),
      payload,
    };
    try {
      if (this.queue) {
        await this.queue.add(topic, event, {
          jobId: event.id,
          attempts: 5,
          backoff: { type: 'exponential', delay: 2000 },
          removeOnComplete: 100,
          removeOnFail: 500,
        });
      } else {
        this.track(this.processor.deliverInline(event));
      }
      this.logger.debug({ msg: 'Event published', topic, eventId: event.id });
      return event;
    } catch (err) {
      this.logger.error({ msg: 'Event publish failed', topic, eventId: event.id, error: errorMessage(err) });
      return null;
    }
  }

  /** Waits for inline deliveries still in flight. */
  async drain() {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  async onApplicationShutdown() {
    await this.drain();
  }

  private track(delivery: Promise<unknown>) {
    const tracked = delivery
      .catch((err) => {
        this.logger.error({ msg: 'Inline event delivery failed', error: errorMessage(err) });
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }
}
