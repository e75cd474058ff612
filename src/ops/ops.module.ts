import { Module } from '@nestjs/common';
import { EventsModule } from '../events/events.module';
import { OpsAlertService } from './ops-alert.service';

@Module({
  imports: [EventsModule],
  providers: [OpsAlertService],
  exports: [OpsAlertService],
})
export class OpsModule {}
