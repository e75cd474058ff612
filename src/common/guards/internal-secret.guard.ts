import { CanActivate, ExecutionContext, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { timingSafeEqual } from 'crypto';
import { ErrorCode } from '../errors';

/** Collaborator API access: `x-internal-secret` must match INTERNAL_SECRET. */
@Injectable()
export class InternalSecretGuard implements CanActivate {
  private readonly logger = new Logger(InternalSecretGuard.name);
  private readonly secret: string;

  constructor(private readonly config: ConfigService) {
    this.secret = this.config.get<string>('INTERNAL_SECRET') ?? '';
    if (!this.secret) {
      this.logger.warn('INTERNAL_SECRET is not configured; collaborator routes will reject every request');
    }
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const correlationId = request.headers['x-correlation-id'];
    const provided = this.normalizeHeader(request.headers['x-internal-secret']);

    if (!provided || !this.secret || !this.safeCompare(provided, this.secret)) {
      this.logger.warn({
        msg: 'Internal secret invalid',
        correlationId,
        providedHeader: provided ? 'x-internal-secret' : 'none',
      });
      throw new UnauthorizedException({ code: ErrorCode.UNAUTHORIZED, message: 'Internal access denied' });
    }

    return true;
  }

  private normalizeHeader(value: string | string[] | undefined) {
    if (!value) return '';
    return Array.isArray(value) ? value[0] : value;
  }

  private safeCompare(a: string, b: string) {
    const aBuf = Buffer.from(a);
    const bBuf = Buffer.from(b);
    if (aBuf.length !== bBuf.length) return false;
    return timingSafeEqual(aBuf, bBuf);
  }
}
