import { ApiProperty } from '@nestjs/swagger';
import { IsEnum, IsInt, IsOptional, IsString, Length, Max, Min } from 'class-validator';
import { OrderState } from './order.types';

export class CancelOrderDto {
  @ApiProperty({ description: 'Code from GET /orders/:id/cancellation-reasons' })
  @IsString()
  @Length(1, 64)
  reasonCode!: string;
}

export class ListOrdersQueryDto {
  @ApiProperty({ required: false }) @IsOptional() @IsString() merchantId?: string;
  @ApiProperty({ required: false, enum: OrderState }) @IsOptional() @IsEnum(OrderState) state?: OrderState;
  @ApiProperty({ required: false, default: 100 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(500)
  limit?: number;
}
