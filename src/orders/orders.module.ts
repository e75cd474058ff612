import { Module } from '@nestjs/common';
import { EventsModule } from '../events/events.module';
import { MarketplaceModule } from '../marketplace/marketplace.module';
import { CancellationReasonsService } from './cancellation-reasons.service';
import { InMemoryOrderRepository, ORDER_REPOSITORY } from './order.repository';
import { OrdersController } from './orders.controller';
import { OrdersService } from './orders.service';

@Module({
  imports: [MarketplaceModule, EventsModule],
  controllers: [OrdersController],
  providers: [
    { provide: ORDER_REPOSITORY, useClass: InMemoryOrderRepository },
    CancellationReasonsService,
    OrdersService,
  ],
  exports: [OrdersService, CancellationReasonsService],
})
export class OrdersModule {}
