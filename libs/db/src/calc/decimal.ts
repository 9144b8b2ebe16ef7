import Decimal from 'decimal.js';

// 40 significant digits hold an 8-dp factor times any decimal(15,2) or
// decimal(15,6) amount without rounding.
export const CalcDecimal = Decimal.clone({ precision: 40 });
