import { signEventPayload } from './hmac.util';

describe('Event bus HMAC util', () => {
  it('signs the timestamped body with the shared secret', () => {
    const body = JSON.stringify({ topic: 'order.confirmed', payload: { orderId: 'o-1' } });
    expect(signEventPayload('test-secret', 1_767_268_800, body)).toBe(
      'f86903a397bb383024ee6519886e3004fa847bd669d9c96b8480cf58a3a307a1',
    );
  });
});
