import { IsString, MinLength } from 'class-validator';
import { IsIsoDate } from '../../validation/is-iso-date';
import { IsOnOrAfter } from '../../validation/is-on-or-after';

export class PricesQueryDto {
  // comma separated
  @IsString()
  @MinLength(1)
  symbols!: string;

  @IsIsoDate()
  from!: string;

  @IsIsoDate()
  @IsOnOrAfter('from')
  to!: string;
}
