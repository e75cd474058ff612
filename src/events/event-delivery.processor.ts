import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Job } from 'bullmq';
import axios from 'axios';
import * as Sentry from '@sentry/node';
import { CLOCK, Clock } from '../common/utils/clock';
import { errorMessage } from '../common/errors';
import { signEventPayload } from './hmac.util';
import { DeliveryResult, EVENT_BUS_QUEUE, PublishedEvent } from './events.types';

const INLINE_BACKOFF_MS = [1_000, 5_000, 15_000];
const DELIVERY_TIMEOUT_MS = 5_000;

@Processor(EVENT_BUS_QUEUE)
@Injectable()
export class EventDeliveryProcessor extends WorkerHost {
  private readonly logger = new Logger(EventDeliveryProcessor.name);
  private readonly webhookUrl: string;
  private readonly hmacSecret: string;

  constructor(
    private readonly config: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    super();
    this.webhookUrl = this.config.get<string>('EVENT_BUS_WEBHOOK_URL') ?? '';
    this.hmacSecret = this.config.get<string>('EVENT_BUS_HMAC_SECRET') ?? '';
  }

  async process(job: Job<PublishedEvent>): Promise<DeliveryResult> {
    return this.deliver(job.data, job.attemptsMade + 1);
  }

  /** One signed POST to the bus. Throws on anything but 2xx or 409. */
  async deliver(event: PublishedEvent, attempt = 1): Promise<DeliveryResult> {
    if (!this.webhookUrl) {
      this.logger.debug({ msg: 'Event bus not configured; event logged only', eventId: event.id, topic: event.topic });
      return 'skipped';
    }
    const timestamp = Math.floor(this.clock.now() / 1000);
    const body = JSON.stringify(event);
    const response = await axios.post(this.webhookUrl, body, {
      headers: {
        'content-type': 'application/json',
        'x-connector-topic': event.topic,
        'x-connector-event-id': event.id,
        'x-connector-timestamp': String(timestamp),
        'x-connector-signature': signEventPayload(this.hmacSecret, timestamp, body),
        'x-connector-attempt': String(attempt),
      },
      timeout: DELIVERY_TIMEOUT_MS,
      validateStatus: () => true,
    });
    if (response.status === 409) {
      this.logger.warn({ msg: 'Received 409, treating as delivered (idempotent)', eventId: event.id });
      return 'delivered';
    }
    if (response.status < 200 || response.status >= 300) {
      throw new Error(`Event bus responded with status ${response.status}`);
    }
    this.logger.debug({ msg: 'Event delivered', eventId: event.id, topic: event.topic, attempt });
    return 'delivered';
  }

  /** Delivery without a queue: bounded retries, then the event is reported and given up. */
  async deliverInline(event: PublishedEvent): Promise<DeliveryResult | null> {
    const maxAttempts = INLINE_BACKOFF_MS.length + 1;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        return await this.deliver(event, attempt);
      } catch (err) {
        const delay = INLINE_BACKOFF_MS[attempt - 1];
        this.logger.warn({
          msg: 'Event bus delivery failed',
          eventId: event.id,
          topic: event.topic,
          attempt,
          delayMs: delay,
          error: errorMessage(err),
        });
        if (delay === undefined) break;
        await this.clock.sleep(delay);
      }
    }
    this.logger.error({ msg: 'Event bus delivery abandoned', eventId: event.id, topic: event.topic, attempts: maxAttempts });
    Sentry.captureMessage('Event bus delivery abandoned', {
      level: 'error',
      extra: { eventId: event.id, topic: event.topic, attempts: maxAttempts },
    });
    return null;
  }
}
