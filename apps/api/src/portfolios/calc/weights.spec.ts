import Decimal from 'decimal.js';
import { checkWeightsSum } from '@valuation/db';

describe('checkWeightsSum', () => {
  it('balanced when the sum is 1', () => {
    const res = checkWeightsSum(
      ['0.28', '0.087', '0.633'].map((w) => new Decimal(w)),
    );
    expect(res.total.toString()).toBe('1');
    expect(res.balanced).toBe(true);
  });

  it('flags sums away from 1', () => {
    const res = checkWeightsSum([new Decimal('0.5'), new Decimal('0.3')]);
    expect(res.total.toString()).toBe('0.8');
    expect(res.balanced).toBe(false);
  });

  it('tolerates rounding in source data', () => {
    const res = checkWeightsSum([
      new Decimal('0.33333'),
      new Decimal('0.66666'),
    ]);
    expect(res.balanced).toBe(true);
  });
});
