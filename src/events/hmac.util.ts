import { createHmac } from 'crypto';

/** Hex HMAC-SHA256 over `${timestamp}.${body}`, sent as `x-connector-signature`. */
export function signEventPayload(secret: string, timestamp: number, body: string) {
  return createHmac('sha256', secret).update(`${timestamp}.${body}`).digest('hex');
}
