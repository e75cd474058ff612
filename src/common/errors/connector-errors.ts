import { HttpStatus } from '@nestjs/common';
import { DomainError } from './domain-error';
import { ErrorCode } from './error-codes';

/** Credentials rejected by the marketplace. Fatal until rotated externally. */
export class AuthError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.AUTH_ERROR, message, HttpStatus.SERVICE_UNAVAILABLE, details);
    this.name = 'AuthError';
  }
}

export class UpstreamUnavailable extends DomainError {
  constructor(
    public readonly endpoint: string,
    message: string,
    public readonly circuitOpen = false,
    details?: Record<string, unknown>,
  ) {
    super(ErrorCode.UPSTREAM_UNAVAILABLE, message, HttpStatus.SERVICE_UNAVAILABLE, { endpoint, circuitOpen, ...details });
    this.name = 'UpstreamUnavailable';
  }
}

export class RateLimited extends DomainError {
  constructor(
    public readonly endpoint: string,
    public readonly retryAfterMs?: number,
  ) {
    super(ErrorCode.UPSTREAM_RATE_LIMITED, `Rate limited on ${endpoint}`, HttpStatus.TOO_MANY_REQUESTS, {
      endpoint,
      retryAfterMs,
    });
    this.name = 'RateLimited';
  }
}

/** Upstream answered with a 4xx that retrying cannot fix. */
export class UpstreamRequestError extends DomainError {
  constructor(
    public readonly endpoint: string,
    public readonly status: number,
    public readonly body?: unknown,
  ) {
    super(ErrorCode.UPSTREAM_REQUEST_FAILED, `Marketplace rejected ${endpoint} with HTTP ${status}`, HttpStatus.BAD_GATEWAY, {
      endpoint,
      status,
    });
    this.name = 'UpstreamRequestError';
  }
}

export class InvalidTransition extends DomainError {
  constructor(
    public readonly orderId: string,
    public readonly from: string | null,
    public readonly action: string,
  ) {
    super(
      ErrorCode.INVALID_TRANSITION,
      `Cannot apply ${action} to order ${orderId} in state ${from ?? 'NONE'}`,
      HttpStatus.CONFLICT,
      { orderId, from, action },
    );
    this.name = 'InvalidTransition';
  }
}

export class ProtocolViolation extends DomainError {
  constructor(
    public readonly orderId: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(ErrorCode.PROTOCOL_VIOLATION, message, HttpStatus.CONFLICT, { orderId, ...details });
    this.name = 'ProtocolViolation';
  }
}

export class AckFailureEscalation extends DomainError {
  constructor(
    public readonly merchantId: string,
    public readonly eventIds: string[],
    public readonly attempts: number,
    lastError?: string,
  ) {
    super(
      ErrorCode.ACK_FAILURE_ESCALATION,
      `Acknowledgment of ${eventIds.length} event(s) failed after ${attempts} attempts`,
      HttpStatus.BAD_GATEWAY,
      { merchantId, eventIds, attempts, lastError },
    );
    this.name = 'AckFailureEscalation';
  }
}

export class OrderNotFound extends DomainError {
  constructor(orderId: string) {
    super(ErrorCode.ORDER_NOT_FOUND, `Order ${orderId} not found`, HttpStatus.NOT_FOUND, { orderId });
    this.name = 'OrderNotFound';
  }
}

export class InvalidCancellationReason extends DomainError {
  constructor(orderId: string, reasonCode: string, allowed: string[]) {
    super(
      ErrorCode.INVALID_CANCELLATION_REASON,
      `Cancellation reason ${reasonCode} is not valid for order ${orderId}`,
      HttpStatus.BAD_REQUEST,
      { orderId, reasonCode, allowed },
    );
    this.name = 'InvalidCancellationReason';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
