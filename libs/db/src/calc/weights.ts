import Decimal from 'decimal.js';

export const WEIGHTS_SUM_TOLERANCE = new Decimal('0.0001');

export type WeightsCheck = {
  total: Decimal;
  balanced: boolean;
};

// Data-quality diagnostic only: source weights may not add up to exactly 1.
export function checkWeightsSum(
  weights: Decimal[],
  tolerance: Decimal = WEIGHTS_SUM_TOLERANCE,
): WeightsCheck {
  const total = weights.reduce((acc, w) => acc.add(w), new Decimal(0));
  return { total, balanced: total.sub(1).abs().lte(tolerance) };
}
