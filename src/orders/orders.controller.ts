import { Body, Controller, Get, HttpCode, Param, Post, Query, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiTags } from '@nestjs/swagger';
import { InternalSecretGuard } from '../common/guards/internal-secret.guard';
import { CancellationReasonsService } from './cancellation-reasons.service';
import { CancelOrderDto, ListOrdersQueryDto } from './dto';
import { OrdersService } from './orders.service';

@ApiTags('Orders')
@ApiHeader({ name: 'x-internal-secret', required: true })
@UseGuards(InternalSecretGuard)
@Controller({ path: 'orders', version: '1' })
export class OrdersController {
  constructor(
    private readonly service: OrdersService,
    private readonly reasons: CancellationReasonsService,
  ) {}

  @Get()
  list(@Query() query: ListOrdersQueryDto) {
    return this.service.listOrders(query);
  }

  @Get(':id')
  detail(@Param('id') id: string) {
    return this.service.getOrder(id);
  }

  @Get(':id/cancellation-reasons')
  async cancellationReasons(@Param('id') id: string) {
    const order = await this.service.getOrder(id);
    return this.reasons.list(order.merchantId, id);
  }

  @Post(':id/confirm')
  @HttpCode(200)
  confirm(@Param('id') id: string) {
    return this.service.confirmOrder(id);
  }

  @Post(':id/cancel')
  @HttpCode(200)
  cancel(@Param('id') id: string, @Body() dto: CancelOrderDto) {
    return this.service.cancelOrder(id, dto.reasonCode);
  }

  @Post(':id/start-preparation')
  @HttpCode(200)
  startPreparation(@Param('id') id: string) {
    return this.service.startPreparation(id);
  }

  @Post(':id/ready')
  @HttpCode(200)
  ready(@Param('id') id: string) {
    return this.service.markReady(id);
  }

  @Post(':id/dispatch')
  @HttpCode(200)
  dispatch(@Param('id') id: string) {
    return this.service.dispatchOrder(id);
  }
}
