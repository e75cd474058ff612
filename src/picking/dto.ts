import { ApiProperty } from '@nestjs/swagger';
import { IsNumber, IsOptional, IsString, Min } from 'class-validator';

export class PickingItemDto {
  @ApiProperty({ required: false }) @IsOptional() @IsString() productId?: string;
  @ApiProperty({ required: false, description: 'Line to replace or edit' }) @IsOptional() @IsString() uniqueId?: string;
  @ApiProperty({ required: false }) @IsOptional() @IsNumber() @Min(0) quantity?: number;
  @ApiProperty({ required: false }) @IsOptional() @IsNumber() @Min(0) unitPrice?: number;
  @ApiProperty({ required: false }) @IsOptional() @IsString() replacedUniqueId?: string;
}
