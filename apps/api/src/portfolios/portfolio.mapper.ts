import type { Portfolio } from '@valuation/db';
import type { PortfolioRef } from './portfolio.types';

export function toPortfolioRef(p: Portfolio): PortfolioRef {
  return {
    id: p.id,
    name: p.name,
    initialValue: p.initialValue.toFixed(2),
    startDate: p.startDate,
  };
}
