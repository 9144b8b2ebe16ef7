import { Transform, Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Min } from 'class-validator';
import type { TransactionType } from '@valuation/db';
import { IsIsoDate } from '../../validation/is-iso-date';
import { IsPositiveDecimal } from '../../validation/is-positive-decimal';
import { normalizeDecimal } from '../../validation/decimal';

export class CreateTransactionDto {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  portfolioId!: number;

  @IsString()
  assetSymbol!: string;

  @IsIn(['BUY', 'SELL'])
  type!: TransactionType;

  @IsIsoDate()
  date!: string;

  @Transform(({ value }) => normalizeDecimal(value))
  @IsString()
  @IsPositiveDecimal({ message: 'amount must be > 0' })
  amount!: string;

  @IsOptional()
  @IsString()
  notes?: string;
}
