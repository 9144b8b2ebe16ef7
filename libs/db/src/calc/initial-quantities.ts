import Decimal from 'decimal.js';
import { CalcDecimal } from './decimal';

export const QUANTITY_SCALE = 8;
export const DEFAULT_RECONCILIATION_TOLERANCE = new Decimal('0.01');

export type InitialWeightInput = {
  assetId: number;
  symbol: string;
  weight: Decimal;
};

export type InitialHolding = {
  assetId: number;
  symbol: string;
  weight: Decimal;
  price: Decimal;
  quantity: Decimal;
  value: Decimal;
};

export type ReconciliationGap = {
  expected: Decimal;
  actual: Decimal;
  difference: Decimal;
};

export type InitialQuantitiesResult = {
  holdings: InitialHolding[];
  totalValue: Decimal;
  difference: Decimal;
  warnings?: {
    missingPrices?: string[];
    reconciliation?: ReconciliationGap;
  };
};

/**
 * quantity = (weight * initialValue) / startPrice for every weighted asset
 * priced at the start date, rounded to the holdings column scale. Assets
 * without a usable start price are left out and listed under
 * `warnings.missingPrices`; a rebuilt initial value that drifts from the
 * declared one by more than `tolerance` is reported, never thrown.
 */
export function calculateInitialQuantities(
  initialValue: Decimal,
  weights: InitialWeightInput[],
  startPrices: Map<number, Decimal>,
  tolerance: Decimal = DEFAULT_RECONCILIATION_TOLERANCE,
): InitialQuantitiesResult {
  const D = CalcDecimal;
  const holdings: InitialHolding[] = [];
  const missingPrices: string[] = [];

  let totalValue = new D(0);

  for (const w of weights) {
    const price = startPrices.get(w.assetId);
    if (!price || price.lte(0)) {
      missingPrices.push(w.symbol);
      continue;
    }

    const quantity = new D(w.weight)
      .mul(initialValue)
      .div(price)
      .toDecimalPlaces(QUANTITY_SCALE);
    const value = new D(price).mul(quantity);
    totalValue = totalValue.add(value);

    holdings.push({
      assetId: w.assetId,
      symbol: w.symbol,
      weight: w.weight,
      price,
      quantity,
      value,
    });
  }

  const difference = totalValue.sub(initialValue).abs();
  const reconciliation = difference.gt(tolerance)
    ? { expected: initialValue, actual: totalValue, difference }
    : undefined;

  return {
    holdings,
    totalValue,
    difference,
    warnings:
      missingPrices.length || reconciliation
        ? {
            missingPrices: missingPrices.length ? missingPrices : undefined,
            reconciliation,
          }
        : undefined,
  };
}
