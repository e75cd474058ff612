export enum ErrorCode {
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  UNAUTHORIZED = 'UNAUTHORIZED',
  NOT_FOUND = 'NOT_FOUND',
  AUTH_ERROR = 'AUTH_ERROR',
  UPSTREAM_UNAVAILABLE = 'UPSTREAM_UNAVAILABLE',
  UPSTREAM_RATE_LIMITED = 'UPSTREAM_RATE_LIMITED',
  UPSTREAM_REQUEST_FAILED = 'UPSTREAM_REQUEST_FAILED',
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  PROTOCOL_VIOLATION = 'PROTOCOL_VIOLATION',
  ACK_FAILURE_ESCALATION = 'ACK_FAILURE_ESCALATION',
  ORDER_NOT_FOUND = 'ORDER_NOT_FOUND',
  INVALID_CANCELLATION_REASON = 'INVALID_CANCELLATION_REASON',
}

export const ERROR_CODES: { code: ErrorCode; message: string }[] = [
  { code: ErrorCode.INTERNAL_ERROR, message: 'Unexpected server error' },
  { code: ErrorCode.VALIDATION_FAILED, message: 'Request validation failed' },
  { code: ErrorCode.UNAUTHORIZED, message: 'Missing or invalid internal secret' },
  { code: ErrorCode.NOT_FOUND, message: 'Resource not found' },
  { code: ErrorCode.AUTH_ERROR, message: 'Marketplace credentials rejected; rotate credentials' },
  { code: ErrorCode.UPSTREAM_UNAVAILABLE, message: 'Marketplace API unavailable or circuit open' },
  { code: ErrorCode.UPSTREAM_RATE_LIMITED, message: 'Marketplace API rate limit exhausted' },
  { code: ErrorCode.UPSTREAM_REQUEST_FAILED, message: 'Marketplace API rejected the request' },
  { code: ErrorCode.INVALID_TRANSITION, message: 'Order transition not allowed from current state' },
  { code: ErrorCode.PROTOCOL_VIOLATION, message: 'Picking protocol step out of order' },
  { code: ErrorCode.ACK_FAILURE_ESCALATION, message: 'Event acknowledgment failed after max attempts' },
  { code: ErrorCode.ORDER_NOT_FOUND, message: 'Order not found' },
  { code: ErrorCode.INVALID_CANCELLATION_REASON, message: 'Cancellation reason not offered by marketplace' },
];
