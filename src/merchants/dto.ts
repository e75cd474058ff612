import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { ArrayMinSize, IsIn, IsInt, IsOptional, IsString, Length, Min, ValidateNested } from 'class-validator';
import { SalesPeriod } from '../marketplace/marketplace.types';

export class SalesQueryDto {
  @ApiPropertyOptional({ enum: ['today', 'week', 'month'], default: 'today' })
  @IsOptional()
  @IsIn(['today', 'week', 'month'])
  period?: SalesPeriod;
}

export class ItemAvailabilityEntryDto {
  @ApiProperty() @IsString() @Length(1, 200) name!: string;
  @ApiProperty({ description: '0 marks the item unavailable' }) @IsInt() @Min(0) quantity!: number;
}

export class ItemAvailabilityDto {
  @ApiProperty({ type: [ItemAvailabilityEntryDto] })
  @ValidateNested({ each: true })
  @ArrayMinSize(1)
  @Type(() => ItemAvailabilityEntryDto)
  items!: ItemAvailabilityEntryDto[];
}
