import { Body, Controller, Delete, Get, HttpCode, Param, Patch, Post, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiTags } from '@nestjs/swagger';
import { InternalSecretGuard } from '../common/guards/internal-secret.guard';
import { PickingItemDto } from './dto';
import { PickingService } from './picking.service';

@ApiTags('Picking')
@ApiHeader({ name: 'x-internal-secret', required: true })
@UseGuards(InternalSecretGuard)
@Controller({ path: 'orders/:id/picking', version: '1' })
export class PickingController {
  constructor(private readonly picking: PickingService) {}

  @Get()
  session(@Param('id') id: string) {
    return this.picking.getSession(id);
  }

  @Post('begin')
  @HttpCode(200)
  begin(@Param('id') id: string) {
    return this.picking.beginSeparation(id);
  }

  @Post('items')
  @HttpCode(200)
  addItem(@Param('id') id: string, @Body() dto: PickingItemDto) {
    return this.picking.addItem(id, dto);
  }

  @Patch('items/:uniqueId')
  modifyItem(@Param('id') id: string, @Param('uniqueId') uniqueId: string, @Body() dto: PickingItemDto) {
    return this.picking.modifyItem(id, uniqueId, dto);
  }

  @Delete('items/:uniqueId')
  removeItem(@Param('id') id: string, @Param('uniqueId') uniqueId: string) {
    return this.picking.removeItem(id, uniqueId);
  }

  @Post('end')
  @HttpCode(200)
  end(@Param('id') id: string) {
    return this.picking.endSeparation(id);
  }

  @Post('requery')
  @HttpCode(200)
  requery(@Param('id') id: string) {
    return this.picking.requery(id);
  }

  @Delete()
  abort(@Param('id') id: string) {
    return this.picking.abort(id);
  }
}
