import { Transform, Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsString,
  MaxLength,
  MinLength,
  ValidateNested,
} from 'class-validator';
import { IsIsoDate } from '../../validation/is-iso-date';
import { IsPositiveDecimal } from '../../validation/is-positive-decimal';
import { normalizeDecimal } from '../../validation/decimal';

export class PriceRowDto {
  @IsString()
  @MinLength(1)
  @MaxLength(50)
  symbol!: string;

  @IsIsoDate()
  date!: string;

  @Transform(({ value }) => normalizeDecimal(value))
  @IsString()
  @IsPositiveDecimal({ message: 'price must be > 0' })
  price!: string;
}

export class LoadPricesDto {
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => PriceRowDto)
  prices!: PriceRowDto[];
}
