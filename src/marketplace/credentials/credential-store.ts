import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuthError } from '../../common/errors';
import { parseCredentialsMap } from '../../config/env.validation';
import { MerchantCredentials } from '../marketplace.types';

export const CREDENTIAL_STORE = Symbol('CREDENTIAL_STORE');

/** Read-only view of the external secrets store. */
export interface CredentialStore {
  getMerchantCredentials(merchantId: string): Promise<MerchantCredentials>;
}

/**
 * Credentials from the environment: a per-merchant JSON map with the
 * application client as fallback.
 */
@Injectable()
export class EnvCredentialStore implements CredentialStore {
  private readonly perMerchant: Record<string, MerchantCredentials>;
  private readonly fallback?: MerchantCredentials;

  constructor(private readonly config: ConfigService) {
    this.perMerchant = parseCredentialsMap(this.config.get<string>('MARKETPLACE_CREDENTIALS'));
    const clientId = this.config.get<string>('MARKETPLACE_CLIENT_ID');
    const clientSecret = this.config.get<string>('MARKETPLACE_CLIENT_SECRET');
    this.fallback = clientId && clientSecret ? { clientId, clientSecret } : undefined;
  }

  async getMerchantCredentials(merchantId: string): Promise<MerchantCredentials> {
    const credentials = this.perMerchant[merchantId] ?? this.fallback;
    if (!credentials) {
      throw new AuthError(`No marketplace credentials configured for merchant ${merchantId}`, { merchantId });
    }
    return credentials;
  }
}
