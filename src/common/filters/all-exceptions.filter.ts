import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import * as Sentry from '@sentry/node';
import { RequestContextService } from '../context/request-context.service';
import { DomainError, ErrorCode } from '../errors';

interface RenderedError {
  status: number;
  code: ErrorCode;
  message: string;
  details?: unknown;
}

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCode));

function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && KNOWN_CODES.has(value);
}

function fromHttpException(exception: HttpException): RenderedError {
  const status = exception.getStatus();
  const fallbackCode =
    status === HttpStatus.BAD_REQUEST
      ? ErrorCode.VALIDATION_FAILED
      : status === HttpStatus.NOT_FOUND
        ? ErrorCode.NOT_FOUND
        : status === HttpStatus.UNAUTHORIZED
          ? ErrorCode.UNAUTHORIZED
          : ErrorCode.INTERNAL_ERROR;
  const res = exception.getResponse();
  if (typeof res === 'string') {
    return { status, code: fallbackCode, message: res };
  }
  const body: Record<string, unknown> = { ...res };
  const code = isErrorCode(body.code) ? body.code : fallbackCode;
  if (Array.isArray(body.message)) {
    return { status, code, message: 'Validation failed', details: { errors: body.message } };
  }
  return {
    status,
    code,
    message: typeof body.message === 'string' && body.message ? body.message : exception.message,
    details: body.details ?? body.errors,
  };
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  constructor(private readonly context: RequestContextService) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const header = request.headers['x-correlation-id'];
    const correlationId = this.context.get('correlationId') || (typeof header === 'string' ? header : undefined);
    const merchantId = this.context.get('merchantId');

    let rendered: RenderedError = {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      code: ErrorCode.INTERNAL_ERROR,
      message: 'Internal server error',
    };
    if (exception instanceof DomainError) {
      rendered = {
        status: exception.httpStatus,
        code: exception.code,
        message: exception.userMessage,
        details: exception.details,
      };
    } else if (exception instanceof HttpException) {
      rendered = fromHttpException(exception);
    } else if (exception instanceof Error) {
      rendered.message = exception.message;
    }
    const { status, code, message, details } = rendered;

    if (status >= 500) {
      Sentry.captureException(exception, {
        tags: { correlationId: correlationId || '', merchantId: merchantId || '', code },
        extra: { path: request.path, method: request.method },
      });
    }

    const logPayload = {
      correlationId,
      merchantId,
      path: request.path,
      method: request.method,
      status,
      code,
    };
    if (status >= 500) {
      this.logger.error({ ...logPayload, message }, exception instanceof Error ? exception.stack : undefined);
    } else {
      this.logger.warn({ ...logPayload, message });
    }

    if (response.headersSent) {
      return;
    }

    response.status(status).json({
      success: false,
      error: { code, message },
      details,
      correlationId,
    });
  }
}
