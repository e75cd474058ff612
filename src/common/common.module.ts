import { Global, Module } from '@nestjs/common';
import { RequestContextService } from './context/request-context.service';
import { CacheService } from './cache/cache.service';
import { ResponseInterceptor } from './interceptors/response.interceptor';
import { AllExceptionsFilter } from './filters/all-exceptions.filter';
import { InternalSecretGuard } from './guards/internal-secret.guard';
import { CLOCK, systemClock } from './utils/clock';

@Global()
@Module({
  providers: [
    { provide: CLOCK, useValue: systemClock },
    RequestContextService,
    CacheService,
    ResponseInterceptor,
    AllExceptionsFilter,
    InternalSecretGuard,
  ],
  exports: [CLOCK, RequestContextService, CacheService, ResponseInterceptor, AllExceptionsFilter, InternalSecretGuard],
})
export class CommonModule {}
