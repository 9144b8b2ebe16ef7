import Decimal from 'decimal.js';
import { CalcDecimal } from './decimal';

export type MetricsPriceRow = {
  date: string;
  assetId: number;
  symbol: string;
  price: Decimal;
};

export type DailyMetrics = {
  date: string;
  portfolioValue: Decimal;
  weights: Record<string, Decimal>;
  assetValues: Record<string, Decimal>;
};

/**
 * Turns fixed quantities and daily prices into one record per date. An
 * asset's value is price times quantity, the portfolio value is their sum
 * and each weight is value over that sum (0 when the sum is 0).
 *
 * Rows are grouped by date explicitly, so input order only matters for the
 * order of symbols inside a day. Rows for assets without a quantity are
 * ignored.
 */
export function calculatePortfolioMetrics(
  quantities: Map<number, Decimal>,
  prices: MetricsPriceRow[],
): DailyMetrics[] {
  const byDate = new Map<string, MetricsPriceRow[]>();

  for (const row of prices) {
    if (!quantities.has(row.assetId)) continue;

    const group = byDate.get(row.date);
    if (group) group.push(row);
    else byDate.set(row.date, [row]);
  }

  const dates = [...byDate.keys()].sort();

  return dates.map((date) =>
    dailyMetrics(date, byDate.get(date) ?? [], quantities),
  );
}

function dailyMetrics(
  date: string,
  rows: MetricsPriceRow[],
  quantities: Map<number, Decimal>,
): DailyMetrics {
  const D = CalcDecimal;
  const assetValues: Record<string, Decimal> = {};
  let portfolioValue = new D(0);

  for (const row of rows) {
    const quantity = quantities.get(row.assetId) ?? new D(0);
    const value = new D(row.price).mul(quantity);
    assetValues[row.symbol] = value;
    portfolioValue = portfolioValue.add(value);
  }

  const weights: Record<string, Decimal> = {};
  for (const [symbol, value] of Object.entries(assetValues)) {
    weights[symbol] = portfolioValue.gt(0)
      ? value.div(portfolioValue)
      : new D(0);
  }

  return { date, portfolioValue, weights, assetValues };
}
