import Decimal from 'decimal.js';
import { calculateInitialQuantities } from '@valuation/db';

const D = Decimal;

const weights = [
  { assetId: 1, symbol: 'EEUU', weight: new D('0.28') },
  { assetId: 2, symbol: 'Europa', weight: new D('0.087') },
];

describe('calculateInitialQuantities', () => {
  it('c = w * V0 / p for every priced asset', () => {
    const res = calculateInitialQuantities(
      new D('1000000000.00'),
      weights,
      new Map([
        [1, new D('100.00')],
        [2, new D('50.00')],
      ]),
    );

    expect(res.holdings.map((h) => h.symbol)).toEqual(['EEUU', 'Europa']);
    expect(res.holdings[0].quantity.toString()).toBe('2800000');
    expect(res.holdings[1].quantity.toString()).toBe('1740000');
    expect(res.holdings[0].value.toString()).toBe('280000000');
    expect(res.totalValue.toString()).toBe('367000000');
  });

  it('skips assets without a start price and reports them', () => {
    const res = calculateInitialQuantities(
      new D('1000'),
      [
        { assetId: 1, symbol: 'A', weight: new D('0.5') },
        { assetId: 2, symbol: 'B', weight: new D('0.5') },
      ],
      new Map([[1, new D('10')]]),
    );

    expect(res.holdings).toHaveLength(1);
    expect(res.holdings[0].symbol).toBe('A');
    expect(res.holdings[0].quantity.toString()).toBe('50');
    expect(res.warnings?.missingPrices).toEqual(['B']);
  });

  it('treats a zero start price as missing', () => {
    const res = calculateInitialQuantities(
      new D('1000'),
      [{ assetId: 1, symbol: 'A', weight: new D('1') }],
      new Map([[1, new D(0)]]),
    );

    expect(res.holdings).toEqual([]);
    expect(res.warnings?.missingPrices).toEqual(['A']);
  });

  it('no warnings when weights cover V0 exactly', () => {
    const res = calculateInitialQuantities(
      new D('1000'),
      [
        { assetId: 1, symbol: 'A', weight: new D('0.6') },
        { assetId: 2, symbol: 'B', weight: new D('0.4') },
      ],
      new Map([
        [1, new D('20')],
        [2, new D('8')],
      ]),
    );

    expect(res.difference.toString()).toBe('0');
    expect(res.warnings).toBeUndefined();
  });

  it('reports a reconciliation gap beyond tolerance', () => {
    const res = calculateInitialQuantities(
      new D('1000'),
      [{ assetId: 1, symbol: 'A', weight: new D('0.9') }],
      new Map([[1, new D('10')]]),
    );

    const gap = res.warnings?.reconciliation;
    expect(gap?.expected.toString()).toBe('1000');
    expect(gap?.actual.toString()).toBe('900');
    expect(gap?.difference.toString()).toBe('100');
    expect(res.warnings?.missingPrices).toBeUndefined();
  });

  it('tolerance is configurable', () => {
    const res = calculateInitialQuantities(
      new D('1000'),
      [{ assetId: 1, symbol: 'A', weight: new D('0.9') }],
      new Map([[1, new D('10')]]),
      new D('100'),
    );

    expect(res.warnings).toBeUndefined();
  });

  it('rounds quantities to 8 decimal places', () => {
    const res = calculateInitialQuantities(
      new D('100'),
      [{ assetId: 1, symbol: 'A', weight: new D('1') }],
      new Map([[1, new D('3')]]),
    );

    expect(res.holdings[0].quantity.toString()).toBe('33.33333333');
    expect(res.warnings).toBeUndefined();
  });

  it('keeps every digit of weight * V0 for large initial values', () => {
    const res = calculateInitialQuantities(
      new D('9876543210987.65'),
      [{ assetId: 1, symbol: 'A', weight: new D('0.12345678') }],
      new Map([[1, new D('1')]]),
    );

    // exact product is 1219326222359.3958887670
    expect(res.holdings[0].quantity.toString()).toBe(
      '1219326222359.39588877',
    );
  });
});
