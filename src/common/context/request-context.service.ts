import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface RequestContextState {
  correlationId: string;
  ip?: string;
  userAgent?: string;
  merchantId?: string;
  source?: 'http' | 'poller';
}

@Injectable()
export class RequestContextService {
  private readonly storage = new AsyncLocalStorage<RequestContextState>();

  run<T>(callback: () => T, seed?: Partial<RequestContextState>): T {
    const store: RequestContextState = {
      correlationId: seed?.correlationId || randomUUID(),
      ip: seed?.ip,
      userAgent: seed?.userAgent,
      merchantId: seed?.merchantId,
      source: seed?.source,
    };
    return this.storage.run(store, callback);
  }

  get<T extends keyof RequestContextState>(key: T): RequestContextState[T] | undefined {
    const store = this.storage.getStore();
    return store ? store[key] : undefined;
  }

  set<T extends keyof RequestContextState>(key: T, value: RequestContextState[T]) {
    const store = this.storage.getStore();
    if (store) {
      store[key] = value;
    }
  }

  getStore() {
    return this.storage.getStore();
  }
}
