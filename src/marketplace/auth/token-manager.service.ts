import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { z } from 'zod';
import { CLOCK, Clock } from '../../common/utils/clock';
import { AuthError, UpstreamRequestError, UpstreamUnavailable, errorMessage } from '../../common/errors';
import { CREDENTIAL_STORE, CredentialStore } from '../credentials/credential-store';
import { Credential, MerchantCredentials } from '../marketplace.types';

export const TOKEN_ENDPOINT = '/authentication/v1.0/oauth/token';

const DEFAULT_REFRESH_TTL_SECONDS = 7 * 24 * 60 * 60;

const tokenResponseSchema = z.object({
  accessToken: z.string().min(1),
  expiresIn: z.coerce.number().positive(),
  refreshToken: z.string().optional(),
  refreshExpiresIn: z.coerce.number().positive().optional(),
});

type GrantForm = Record<string, string>;

@Injectable()
export class TokenManager {
  private readonly logger = new Logger(TokenManager.name);
  private readonly tokens = new Map<string, Credential>();
  private readonly inflight = new Map<string, Promise<Credential>>();
  private refreshChain: Promise<unknown> = Promise.resolve();
  private readonly tokenUrl: string;
  private readonly refreshRatio: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly config: ConfigService,
    @Inject(CREDENTIAL_STORE) private readonly credentials: CredentialStore,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    const baseUrl = this.config.get<string>('MARKETPLACE_API_BASE_URL') || 'https://merchant-api.ifood.com.br';
    this.tokenUrl = `${baseUrl.replace(/\/+$/, '')}${TOKEN_ENDPOINT}`;
    this.refreshRatio = Number(this.config.get('TOKEN_REFRESH_RATIO') ?? 0.2);
    this.timeoutMs = Number(this.config.get('MARKETPLACE_REQUEST_TIMEOUT_MS') ?? 4000);
  }

  /** A valid bearer token for the merchant's client, refreshed when inside the refresh window. */
  async getToken(merchantId: string): Promise<string> {
    const creds = await this.credentials.getMerchantCredentials(merchantId);
    const current = this.tokens.get(creds.clientId);
    if (current && !this.needsRefresh(current)) {
      return current.accessToken;
    }
    const refreshed = await this.refreshOnce(creds);
    return refreshed.accessToken;
  }

  /** Drops the cached token so the next caller fetches a new one (used on HTTP 401). */
  async invalidate(merchantId: string) {
    const creds = await this.credentials.getMerchantCredentials(merchantId);
    if (this.tokens.delete(creds.clientId)) {
      this.logger.warn({ msg: 'Marketplace token invalidated', merchantId, clientId: creds.clientId });
    }
  }

  needsRefresh(credential: Credential): boolean {
    const now = this.clock.now();
    if (now >= credential.expiresAt) return true;
    const lifetime = credential.expiresAt - credential.issuedAt;
    return credential.expiresAt - now < lifetime * this.refreshRatio;
  }

  private refreshOnce(creds: MerchantCredentials): Promise<Credential> {
    const pending = this.inflight.get(creds.clientId);
    if (pending) return pending;
    const run = this.serialize(() => this.refresh(creds)).finally(() => {
      this.inflight.delete(creds.clientId);
    });
    this.inflight.set(creds.clientId, run);
    return run;
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.refreshChain.then(task);
    this.refreshChain = run.catch(() => undefined);
    return run;
  }

  private async refresh(creds: MerchantCredentials): Promise<Credential> {
    const current = this.tokens.get(creds.clientId);
    const now = this.clock.now();
    if (current?.refreshToken && current.refreshExpiresAt !== undefined && current.refreshExpiresAt > now) {
      try {
        return await this.grant(creds, {
          grantType: 'refresh_token',
          clientId: creds.clientId,
          clientSecret: creds.clientSecret,
          refreshToken: current.refreshToken,
        });
      } catch (err) {
        if (!(err instanceof AuthError)) throw err;
        this.logger.warn({ msg: 'Refresh grant rejected; requesting new client token', clientId: creds.clientId });
      }
    }
    return this.grant(creds, {
      grantType: 'client_credentials',
      clientId: creds.clientId,
      clientSecret: creds.clientSecret,
    });
  }

  private async grant(creds: MerchantCredentials, form: GrantForm): Promise<Credential> {
    const startedAt = this.clock.now();
    const response = await axios
      .post(this.tokenUrl, new URLSearchParams(form).toString(), {
        headers: { 'content-type': 'application/x-www-form-urlencoded', accept: 'application/json' },
        timeout: this.timeoutMs,
        validateStatus: () => true,
      })
      .catch((err: unknown) => {
        throw new UpstreamUnavailable(TOKEN_ENDPOINT, `Token request failed: ${errorMessage(err)}`);
      });

    if (response.status === 400 || response.status === 401 || response.status === 403) {
      this.tokens.delete(creds.clientId);
      throw new AuthError(`Marketplace rejected ${form.grantType} grant with HTTP ${response.status}`, {
        clientId: creds.clientId,
        status: response.status,
      });
    }
    if (response.status === 429 || response.status >= 500) {
      throw new UpstreamUnavailable(TOKEN_ENDPOINT, `Token endpoint responded with HTTP ${response.status}`);
    }
    if (response.status < 200 || response.status >= 300) {
      throw new UpstreamRequestError(TOKEN_ENDPOINT, response.status, response.data);
    }

    const parsed = tokenResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new UpstreamRequestError(TOKEN_ENDPOINT, response.status, response.data);
    }
    const body = parsed.data;
    const credential: Credential = {
      accessToken: body.accessToken,
      issuedAt: startedAt,
      expiresAt: startedAt + body.expiresIn * 1000,
      refreshToken: body.refreshToken ?? form.refreshToken,
      refreshExpiresAt: startedAt + (body.refreshExpiresIn ?? DEFAULT_REFRESH_TTL_SECONDS) * 1000,
    };
    this.tokens.set(creds.clientId, credential);
    this.logger.log({
      msg: 'Marketplace token issued',
      clientId: creds.clientId,
      grantType: form.grantType,
      expiresAt: new Date(credential.expiresAt).toISOString(),
    });
    return credential;
  }
}
