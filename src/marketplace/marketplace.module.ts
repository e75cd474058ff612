import { Module } from '@nestjs/common';
import { TokenManager } from './auth/token-manager.service';
import { CREDENTIAL_STORE, EnvCredentialStore } from './credentials/credential-store';
import { MarketplaceApiService } from './marketplace-api.service';
import { MarketplaceHttpClient } from './transport/marketplace-http.client';

@Module({
  providers: [
    { provide: CREDENTIAL_STORE, useClass: EnvCredentialStore },
    TokenManager,
    MarketplaceHttpClient,
    MarketplaceApiService,
  ],
  exports: [CREDENTIAL_STORE, TokenManager, MarketplaceHttpClient, MarketplaceApiService],
})
export class MarketplaceModule {}
