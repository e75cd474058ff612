import { ManualClock } from '../../common/testing/manual-clock';
import { TokenBucket, TokenBucketRegistry } from './token-bucket';

describe('TokenBucket', () => {
  it('spends the burst capacity then asks to wait for a refill', () => {
    const clock = new ManualClock();
    const bucket = new TokenBucket({ capacity: 2, refillPerMinute: 60 }, () => clock.now());
    expect(bucket.take()).toBe(0);
    expect(bucket.take()).toBe(0);
    expect(bucket.take()).toBe(1_000);
  });

  it('refills with elapsed time up to capacity', () => {
    const clock = new ManualClock();
    const bucket = new TokenBucket({ capacity: 2, refillPerMinute: 60 }, () => clock.now());
    bucket.take();
    bucket.take();
    clock.advance(500);
    expect(bucket.take()).toBe(500);
    clock.advance(500);
    expect(bucket.take()).toBe(0);
    clock.advance(60_000);
    expect(bucket.available()).toBe(2);
  });

  it('keeps one bucket per endpoint template', () => {
    const clock = new ManualClock();
    const registry = new TokenBucketRegistry({ capacity: 1, refillPerMinute: 60 }, () => clock.now());
    expect(registry.get('/order/v1.0/orders/:orderId/confirm').take()).toBe(0);
    expect(registry.get('/order/v1.0/orders/:orderId/confirm').take()).toBe(1_000);
    expect(registry.get('/order/v1.0/events:polling').take()).toBe(0);
  });
});
