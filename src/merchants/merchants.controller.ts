import { Body, Controller, Delete, Get, HttpCode, Param, Post, Put, Query, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiTags } from '@nestjs/swagger';
import { InternalSecretGuard } from '../common/guards/internal-secret.guard';
import { ItemAvailabilityDto, SalesQueryDto } from './dto';
import { MerchantsService } from './merchants.service';

@ApiTags('Merchants')
@ApiHeader({ name: 'x-internal-secret', required: true })
@UseGuards(InternalSecretGuard)
@Controller({ path: 'merchants', version: '1' })
export class MerchantsController {
  constructor(private readonly service: MerchantsService) {}

  @Get()
  list() {
    return this.service.list();
  }

  @Post(':id')
  register(@Param('id') id: string) {
    return this.service.register(id);
  }

  @Delete(':id')
  deregister(@Param('id') id: string) {
    return this.service.deregister(id);
  }

  @Get(':id/status')
  status(@Param('id') id: string) {
    return this.service.getStatus(id);
  }

  @Get(':id/opening-hours')
  openingHours(@Param('id') id: string) {
    return this.service.getOpeningHours(id);
  }

  @Get(':id/sales')
  sales(@Param('id') id: string, @Query() query: SalesQueryDto) {
    return this.service.getSalesSummary(id, query.period);
  }

  @Put(':id/items/availability')
  itemAvailability(@Param('id') id: string, @Body() dto: ItemAvailabilityDto) {
    return this.service.updateItemAvailability(id, dto.items);
  }

  @Get(':id/health')
  health(@Param('id') id: string) {
    return this.service.getHealth(id);
  }

  @Post(':id/poll')
  @HttpCode(200)
  poll(@Param('id') id: string) {
    return this.service.pollNow(id);
  }
}
