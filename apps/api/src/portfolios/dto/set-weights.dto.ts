import { Transform, Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsString,
  MinLength,
  ValidateNested,
} from 'class-validator';
import { IsDecimalInRange } from '../../validation/is-decimal-in-range';
import { normalizeDecimal } from '../../validation/decimal';

export class WeightItemDto {
  @IsString()
  @MinLength(1)
  symbol!: string;

  @Transform(({ value }) => normalizeDecimal(value))
  @IsString()
  @IsDecimalInRange(0, 1)
  weight!: string;
}

export class SetWeightsDto {
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => WeightItemDto)
  weights!: WeightItemDto[];
}
