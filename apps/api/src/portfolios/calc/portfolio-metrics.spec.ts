import Decimal from 'decimal.js';
import { calculatePortfolioMetrics } from '@valuation/db';

const D = Decimal;

const quantities = new Map([
  [1, new D('2800000')],
  [2, new D('1740000')],
]);

const row = (date: string, assetId: number, symbol: string, price: string) => ({
  date,
  assetId,
  symbol,
  price: new D(price),
});

describe('calculatePortfolioMetrics', () => {
  it('values a day from fixed quantities', () => {
    const [day] = calculatePortfolioMetrics(quantities, [
      row('2022-02-16', 1, 'EEUU', '102.00'),
      row('2022-02-16', 2, 'Europa', '49.00'),
    ]);

    expect(day.date).toBe('2022-02-16');
    expect(day.assetValues.EEUU.toString()).toBe('285600000');
    expect(day.assetValues.Europa.toString()).toBe('85260000');
    expect(day.portfolioValue.toString()).toBe('370860000');
    expect(day.weights.EEUU.toNumber()).toBeCloseTo(0.7701, 4);
    expect(day.weights.Europa.toNumber()).toBeCloseTo(0.2299, 4);
  });

  it('asset values add up to the total exactly', () => {
    const days = calculatePortfolioMetrics(quantities, [
      row('2022-02-16', 1, 'EEUU', '101.37'),
      row('2022-02-16', 2, 'Europa', '48.913'),
      row('2022-02-17', 1, 'EEUU', '99.999999'),
      row('2022-02-17', 2, 'Europa', '50.000001'),
    ]);

    for (const day of days) {
      const sum = Object.values(day.assetValues).reduce(
        (acc, v) => acc.add(v),
        new D(0),
      );
      expect(sum.equals(day.portfolioValue)).toBe(true);

      const weights = Object.values(day.weights).reduce(
        (acc, w) => acc + w.toNumber(),
        0,
      );
      expect(weights).toBeCloseTo(1, 10);
    }
  });

  it('groups interleaved rows of one date into a single record', () => {
    const days = calculatePortfolioMetrics(quantities, [
      row('2022-02-17', 1, 'EEUU', '100'),
      row('2022-02-16', 1, 'EEUU', '100'),
      row('2022-02-17', 2, 'Europa', '50'),
      row('2022-02-16', 2, 'Europa', '50'),
    ]);

    expect(days.map((d) => d.date)).toEqual(['2022-02-16', '2022-02-17']);
    expect(Object.keys(days[1].assetValues)).toEqual(['EEUU', 'Europa']);
    expect(days[1].portfolioValue.toString()).toBe('367000000');
  });

  it('all-zero prices give zero value and zero weights', () => {
    const [day] = calculatePortfolioMetrics(quantities, [
      row('2022-02-16', 1, 'EEUU', '0'),
      row('2022-02-16', 2, 'Europa', '0'),
    ]);

    expect(day.portfolioValue.toString()).toBe('0');
    expect(day.weights.EEUU.toString()).toBe('0');
    expect(day.weights.Europa.toString()).toBe('0');
  });

  it('ignores prices of assets without a quantity', () => {
    const [day] = calculatePortfolioMetrics(quantities, [
      row('2022-02-16', 1, 'EEUU', '100'),
      row('2022-02-16', 3, 'UK', '80'),
    ]);

    expect(Object.keys(day.assetValues)).toEqual(['EEUU']);
    expect(day.weights.EEUU.toString()).toBe('1');
  });

  it('multiplies price by quantity without rounding', () => {
    const [day] = calculatePortfolioMetrics(
      new Map([[1, new D('98765432.12345678')]]),
      [row('2022-02-16', 1, 'A', '123.456789')],
    );

    expect(day.assetValues.A.toString()).toBe('12193263114.15942563907942');
    expect(day.portfolioValue.toString()).toBe('12193263114.15942563907942');
  });

  it('no prices -> empty series', () => {
    expect(calculatePortfolioMetrics(quantities, [])).toEqual([]);
  });
});
