import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosResponse } from 'axios';
import { CLOCK, Clock } from '../../common/utils/clock';
import {
  AuthError,
  RateLimited,
  UpstreamRequestError,
  UpstreamUnavailable,
  errorMessage,
} from '../../common/errors';
import { TokenManager } from '../auth/token-manager.service';
import { HttpMethod } from '../marketplace.types';
import { CircuitBreaker, CircuitBreakerRegistry, CircuitSnapshot } from './circuit-breaker';
import { RetryPolicy, nextDelay, parseRetryAfter } from './retry.policy';
import { TokenBucketRegistry } from './token-bucket';

export interface TransportRequest {
  method: HttpMethod;
  /** Path template, e.g. `/order/v1.0/orders/:orderId/confirm`. Budgets and breakers are keyed on it. */
  endpoint: string;
  merchantId: string;
  params?: Record<string, string>;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  headers?: Record<string, string>;
  timeoutMs?: number;
  /** Latency budget; exceeding it is logged, not enforced. */
  slaMs?: number;
  /** false = exactly one attempt, the caller owns retries. */
  retry?: boolean;
}

export interface TransportResponse<T> {
  status: number;
  data: T;
  headers: Record<string, unknown>;
  attempts: number;
}

@Injectable()
export class MarketplaceHttpClient {
  private readonly logger = new Logger(MarketplaceHttpClient.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly policy: RetryPolicy;
  private readonly buckets: TokenBucketRegistry;
  private readonly breakers: CircuitBreakerRegistry;
  random: () => number = Math.random;

  constructor(
    private readonly config: ConfigService,
    private readonly tokens: TokenManager,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.baseUrl = (this.config.get<string>('MARKETPLACE_API_BASE_URL') || 'https://merchant-api.ifood.com.br').replace(
      /\/+$/,
      '',
    );
    this.timeoutMs = Number(this.config.get('MARKETPLACE_REQUEST_TIMEOUT_MS') ?? 4000);
    this.policy = {
      baseMs: Number(this.config.get('RETRY_BASE_MS') ?? 1000),
      factor: Number(this.config.get('RETRY_FACTOR') ?? 2),
      maxDelayMs: Number(this.config.get('RETRY_MAX_DELAY_MS') ?? 60_000),
      maxAttempts: Number(this.config.get('RETRY_MAX_ATTEMPTS') ?? 6),
      jitter: 0.2,
    };
    const perMinute = Number(this.config.get('MARKETPLACE_RATE_LIMIT_PER_MINUTE') ?? 60);
    const now = () => this.clock.now();
    this.buckets = new TokenBucketRegistry({ capacity: perMinute, refillPerMinute: perMinute }, now);
    this.breakers = new CircuitBreakerRegistry(
      {
        failureThreshold: Number(this.config.get('BREAKER_FAILURE_THRESHOLD') ?? 5),
        windowMs: Number(this.config.get('BREAKER_WINDOW_MS') ?? 60_000),
        cooldownMs: Number(this.config.get('BREAKER_COOLDOWN_MS') ?? 30_000),
        maxCooldownMs: Number(this.config.get('BREAKER_MAX_COOLDOWN_MS') ?? 300_000),
      },
      now,
    );
  }

  /** Backoff before the attempt after `attempt`; shared with callers that run their own retry loop. */
  delayAfter(attempt: number, maxAttempts = this.policy.maxAttempts): number | null {
    return nextDelay(attempt, { ...this.policy, maxAttempts }, this.random);
  }

  breakerSnapshots(): CircuitSnapshot[] {
    return this.breakers.snapshots();
  }

  openCircuits(): string[] {
    return this.breakers.openEndpoints();
  }

  async send<T = unknown>(request: TransportRequest): Promise<TransportResponse<T>> {
    const maxAttempts = request.retry === false ? 1 : this.policy.maxAttempts;
    const breaker = this.breakers.get(request.endpoint);
    const bucket = this.buckets.get(request.endpoint);
    let reauthenticated = false;
    let lastFailure = 'no attempt made';

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (!breaker.tryAcquire()) {
        throw new UpstreamUnavailable(
          request.endpoint,
          `Circuit open for ${request.endpoint}; retry in ${breaker.remainingOpenMs()}ms`,
          true,
        );
      }

      for (let wait = bucket.take(); wait > 0; wait = bucket.take()) {
        this.logger.debug({ msg: 'Request budget exhausted; waiting', endpoint: request.endpoint, waitMs: wait });
        await this.clock.sleep(wait);
      }

      let token: string;
      try {
        token = await this.tokens.getToken(request.merchantId);
      } catch (err) {
        breaker.release();
        throw err;
      }

      const startedAt = this.clock.now();
      let response: AxiosResponse;
      try {
        response = await this.execute(request, token);
      } catch (err) {
        breaker.recordFailure();
        lastFailure = errorMessage(err);
        this.logger.warn({
          msg: 'Marketplace request failed',
          method: request.method,
          endpoint: request.endpoint,
          merchantId: request.merchantId,
          attempt,
          error: lastFailure,
        });
        this.failFastIfOpen(breaker, request.endpoint, attempt, lastFailure);
        const delay = attempt < maxAttempts ? this.delayAfter(attempt, maxAttempts) : null;
        if (delay === null) break;
        await this.clock.sleep(delay);
        continue;
      }

      const elapsedMs = this.clock.now() - startedAt;
      this.logger.log({
        msg: 'Marketplace request',
        method: request.method,
        endpoint: request.endpoint,
        merchantId: request.merchantId,
        status: response.status,
        elapsedMs,
        attempt,
      });
      if (request.slaMs && elapsedMs > request.slaMs) {
        this.logger.warn({
          msg: 'Marketplace request exceeded SLA',
          endpoint: request.endpoint,
          elapsedMs,
          slaMs: request.slaMs,
        });
      }

      const status = response.status;
      if (status >= 200 && status < 300) {
        breaker.recordSuccess();
        const headers: Record<string, unknown> = Object.fromEntries(Object.entries(response.headers ?? {}));
        return { status, data: response.data, headers, attempts: attempt };
      }

      if (status === 401) {
        breaker.release();
        await this.tokens.invalidate(request.merchantId);
        if (reauthenticated) {
          throw new AuthError(`Marketplace rejected a freshly issued token on ${request.endpoint}`, {
            merchantId: request.merchantId,
          });
        }
        reauthenticated = true;
        attempt -= 1;
        continue;
      }

      if (status === 429) {
        breaker.release();
        const retryAfterMs = parseRetryAfter(response.headers?.['retry-after'], this.clock.now());
        const backoff = attempt < maxAttempts ? this.delayAfter(attempt, maxAttempts) : null;
        if (backoff === null) {
          throw new RateLimited(request.endpoint, retryAfterMs);
        }
        const delay = retryAfterMs ?? backoff;
        this.logger.warn({ msg: 'Marketplace rate limited; backing off', endpoint: request.endpoint, delayMs: delay, attempt });
        await this.clock.sleep(delay);
        continue;
      }

      if (status >= 500) {
        breaker.recordFailure();
        lastFailure = `HTTP ${status}`;
        this.failFastIfOpen(breaker, request.endpoint, attempt, lastFailure);
        const delay = attempt < maxAttempts ? this.delayAfter(attempt, maxAttempts) : null;
        if (delay === null) break;
        await this.clock.sleep(delay);
        continue;
      }

      breaker.recordSuccess();
      throw new UpstreamRequestError(request.endpoint, status, response.data);
    }

    throw new UpstreamUnavailable(
      request.endpoint,
      `Marketplace ${request.endpoint} unavailable after ${maxAttempts} attempt(s): ${lastFailure}`,
      breaker.isOpen(),
    );
  }

  /** A failure that opened the circuit ends the call; no backoff is spent on an open endpoint. */
  private failFastIfOpen(breaker: CircuitBreaker, endpoint: string, attempt: number, lastFailure: string) {
    if (!breaker.isOpen()) return;
    throw new UpstreamUnavailable(
      endpoint,
      `Circuit opened for ${endpoint} after ${attempt} attempt(s): ${lastFailure}`,
      true,
    );
  }

  buildUrl(endpoint: string, params: Record<string, string> = {}): string {
    const path = endpoint.replace(/\/:([A-Za-z]+)/g, (_match, name: string) => {
      const value = params[name];
      if (value === undefined) {
        throw new Error(`Missing path parameter "${name}" for ${endpoint}`);
      }
      return `/${encodeURIComponent(value)}`;
    });
    return `${this.baseUrl}${path}`;
  }

  private execute(request: TransportRequest, token: string) {
    return axios.request({
      method: request.method,
      url: this.buildUrl(request.endpoint, request.params),
      params: request.query,
      data: request.body,
      headers: {
        accept: 'application/json',
        'content-type': 'application/json',
        ...request.headers,
        authorization: `Bearer ${token}`,
      },
      timeout: request.timeoutMs ?? this.timeoutMs,
      validateStatus: () => true,
    });
  }
}
