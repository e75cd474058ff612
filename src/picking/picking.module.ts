import { Module } from '@nestjs/common';
import { EventsModule } from '../events/events.module';
import { MarketplaceModule } from '../marketplace/marketplace.module';
import { OrdersModule } from '../orders/orders.module';
import { PickingController } from './picking.controller';
import { PickingService } from './picking.service';

@Module({
  imports: [OrdersModule, MarketplaceModule, EventsModule],
  controllers: [PickingController],
  providers: [PickingService],
  exports: [PickingService],
})
export class PickingModule {}
