import type { TestServices } from './test-services';

export const START = '2022-02-15';

/** Two-asset portfolio priced on the start date and the day after. */
export async function seedTwoAssetPortfolio(services: TestServices) {
  await services.prices.load([
    { symbol: 'EEUU', date: '2022-02-15', price: '100.00' },
    { symbol: 'Europa', date: '2022-02-15', price: '50.00' },
    { symbol: 'EEUU', date: '2022-02-16', price: '102.00' },
    { symbol: 'Europa', date: '2022-02-16', price: '49.00' },
  ]);

  const portfolio = await services.portfolios.create({
    name: 'Portafolio 1',
    initialValue: '1000000000.00',
    startDate: START,
  });

  await services.portfolios.setWeights(portfolio.id, [
    { symbol: 'EEUU', weight: '0.28' },
    { symbol: 'Europa', weight: '0.087' },
  ]);

  return portfolio;
}
