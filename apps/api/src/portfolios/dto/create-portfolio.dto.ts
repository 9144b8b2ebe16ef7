import { Transform } from 'class-transformer';
import { IsString, MaxLength, MinLength } from 'class-validator';
import { IsIsoDate } from '../../validation/is-iso-date';
import { IsPositiveDecimal } from '../../validation/is-positive-decimal';
import { normalizeDecimal } from '../../validation/decimal';

export class CreatePortfolioDto {
  @IsString()
  @MinLength(1)
  @MaxLength(100)
  name!: string;

  @Transform(({ value }) => normalizeDecimal(value))
  @IsString()
  @IsPositiveDecimal({ message: 'initialValue must be > 0' })
  initialValue!: string;

  @IsIsoDate()
  startDate!: string;
}
