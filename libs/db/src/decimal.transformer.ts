import Decimal from 'decimal.js';
import type { ValueTransformer } from 'typeorm';

// pg returns numeric columns as strings, sql.js as numbers
export const decimalTransformer: ValueTransformer = {
  to: (value: Decimal | null | undefined) =>
    value == null ? value : value.toFixed(),
  from: (value: string | number | null) =>
    value == null ? null : new Decimal(value),
};
