import axios from 'axios';
import { Queue } from 'bullmq';
import { RequestContextService } from '../common/context/request-context.service';
import { testConfig } from '../common/testing/config';
import { ManualClock } from '../common/testing/manual-clock';
import { EventDeliveryProcessor } from './event-delivery.processor';
import { EventPublisher } from './event-publisher.service';
import { signEventPayload } from './hmac.util';

jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

const busConfig = { EVENT_BUS_WEBHOOK_URL: 'https://bus.test/events', EVENT_BUS_HMAC_SECRET: 'test-secret' };

function setup(values: Record<string, unknown> = busConfig, queue?: Queue) {
  const clock = new ManualClock();
  const context = new RequestContextService();
  const processor = new EventDeliveryProcessor(testConfig(values), clock);
  const publisher = new EventPublisher(context, processor, clock, queue);
  return { clock, context, publisher };
}

describe('EventPublisher', () => {
  beforeEach(() => {
    mockedAxios.post.mockReset();
  });

  it('stamps the envelope from the request context and posts a signed body', async () => {
    mockedAxios.post.mockResolvedValue({ status: 200, data: {} });
    const { context, publisher } = setup();

    const event = await context.run(() => publisher.publish('order.confirmed', { orderId: 'o-1' }), {
      correlationId: 'corr-1',
      merchantId: 'm-1',
    });
    await publisher.drain();

    expect(event).toMatchObject({
      topic: 'order.confirmed',
      correlationId: 'corr-1',
      merchantId: 'm-1',
      occurredAt: '2026-01-01T12:00:00.000Z',
      payload: { orderId: 'o-1' },
    });
    expect(mockedAxios.post).toHaveBeenCalledTimes(1);
    const [url, body, options] = mockedAxios.post.mock.calls[0];
    expect(url).toBe('https://bus.test/events');
    expect(JSON.parse(String(body))).toEqual(event);
    const headers = options?.headers as Record<string, string>;
    expect(headers['x-connector-timestamp']).toBe('1767268800');
    expect(headers['x-connector-signature']).toBe(signEventPayload('test-secret', 1767268800, String(body)));
    expect(headers['x-connector-topic']).toBe('order.confirmed');
  });

  it('retries inline delivery with backoff', async () => {
    mockedAxios.post
      .mockResolvedValueOnce({ status: 503, data: {} })
      .mockResolvedValueOnce({ status: 502, data: {} })
      .mockResolvedValueOnce({ status: 202, data: {} });
    const { clock, publisher } = setup();

    await publisher.publish('order.ready', { orderId: 'o-2' });
    await publisher.drain();

    expect(mockedAxios.post).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([1000, 5000]);
    const headers = mockedAxios.post.mock.calls[2][2]?.headers as Record<string, string>;
    expect(headers['x-connector-attempt']).toBe('3');
  });

  it('gives up after the last inline attempt without throwing', async () => {
    mockedAxios.post.mockResolvedValue({ status: 500, data: {} });
    const { clock, publisher } = setup();

    await expect(publisher.publish('order.cancelled', { orderId: 'o-3' })).resolves.not.toBeNull();
    await publisher.drain();

    expect(mockedAxios.post).toHaveBeenCalledTimes(4);
    expect(clock.sleeps).toEqual([1000, 5000, 15000]);
  });

  it('treats a 409 as delivered', async () => {
    mockedAxios.post.mockResolvedValue({ status: 409, data: {} });
    const { clock, publisher } = setup();

    await publisher.publish('order.dispatched', { orderId: 'o-4' });
    await publisher.drain();

    expect(mockedAxios.post).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('skips delivery when no bus is configured', async () => {
    const { publisher } = setup({});
    await publisher.publish('order.received', { orderId: 'o-5' });
    await publisher.drain();
    expect(mockedAxios.post).not.toHaveBeenCalled();
  });

  it('enqueues on the queue when one is available', async () => {
    const add = jest.fn().mockResolvedValue({ id: 'job-1' });
    const { publisher } = setup(busConfig, { add } as unknown as Queue);

    const event = await publisher.publish('order.confirmed', { orderId: 'o-6' });

    expect(add).toHaveBeenCalledWith(
      'order.confirmed',
      event,
      expect.objectContaining({ jobId: event?.id, attempts: 5 }),
    );
    expect(mockedAxios.post).not.toHaveBeenCalled();
  });

  it('resolves to null when the queue rejects', async () => {
    const add = jest.fn().mockRejectedValue(new Error('redis down'));
    const { publisher } = setup(busConfig, { add } as unknown as Queue);

    await expect(publisher.publish('order.confirmed', { orderId: 'o-7' })).resolves.toBeNull();
  });
});
