import { Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import {
  Asset,
  Holding,
  Portfolio,
  PortfolioWeight,
  Price,
  Transaction,
  entities,
} from '@valuation/db';
import { AssetsService } from '../assets/assets.service';
import { MetricsService } from '../portfolios/metrics.service';
import { PortfoliosService } from '../portfolios/portfolios.service';
import { QuantitiesService } from '../portfolios/quantities.service';
import { PricesService } from '../prices/prices.service';
import { TransactionsService } from '../transactions/transactions.service';

/** In-process sqlite store with the production schema. */
export async function createTestDataSource() {
  const dataSource = new DataSource({
    type: 'sqljs',
    entities,
    synchronize: true,
  });
  return dataSource.initialize();
}

export function createServices(ds: DataSource) {
  const portfolios = new PortfoliosService(
    ds.getRepository(Portfolio),
    ds.getRepository(PortfolioWeight),
    ds.getRepository(Holding),
    ds.getRepository(Asset),
  );

  return {
    assets: new AssetsService(ds.getRepository(Asset)),
    prices: new PricesService(ds.getRepository(Asset), ds.getRepository(Price)),
    portfolios,
    quantities: new QuantitiesService(
      ds,
      portfolios,
      ds.getRepository(PortfolioWeight),
      ds.getRepository(Price),
    ),
    metrics: new MetricsService(
      portfolios,
      ds.getRepository(Holding),
      ds.getRepository(Price),
    ),
    transactions: new TransactionsService(
      ds.getRepository(Transaction),
      ds.getRepository(Portfolio),
      ds.getRepository(Asset),
    ),
  };
}

export type TestServices = ReturnType<typeof createServices>;

export function silenceLogger() {
  return {
    log: jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined),
    warn: jest
      .spyOn(Logger.prototype, 'warn')
      .mockImplementation(() => undefined),
  };
}
