import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEDUP_STORE, DedupStore } from './dedup.store';

@Injectable()
export class DeduplicatorService {
  private readonly logger = new Logger(DeduplicatorService.name);
  private readonly ttlMs: number;

  constructor(
    @Inject(DEDUP_STORE) private readonly store: DedupStore,
    private readonly config: ConfigService,
  ) {
    this.ttlMs = Number(this.config.get('DEDUP_TTL_HOURS') ?? 24) * 60 * 60 * 1000;
  }

  /** True the first time an event id is seen within the retention window. */
  async admit(eventId: string): Promise<boolean> {
    const admitted = await this.store.claim(eventId, this.ttlMs);
    if (!admitted) {
      this.logger.debug({ msg: 'Duplicate event skipped', eventId });
    }
    return admitted;
  }
}
