import { Type } from 'class-transformer';
import { IsInt, Min } from 'class-validator';
import { IsIsoDate } from '../../validation/is-iso-date';
import { IsOnOrAfter } from '../../validation/is-on-or-after';

// Query names are part of the public API and stay as published.
export class MetricsQueryDto {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  portfolio_id!: number;

  @IsIsoDate()
  fecha_inicio!: string;

  @IsIsoDate()
  @IsOnOrAfter('fecha_inicio', {
    message: 'fecha_fin must be on or after fecha_inicio',
  })
  fecha_fin!: string;
}
