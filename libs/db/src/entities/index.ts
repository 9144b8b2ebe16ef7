import { Asset } from './asset.entity';
import { Holding } from './holding.entity';
import { Portfolio } from './portfolio.entity';
import { PortfolioWeight } from './portfolio-weight.entity';
import { Price } from './price.entity';
import { Transaction } from './transaction.entity';

export { Asset, Holding, Portfolio, PortfolioWeight, Price, Transaction };
export type { TransactionType } from './transaction.entity';

export const entities = [
  Asset,
  Portfolio,
  Price,
  PortfolioWeight,
  Holding,
  Transaction,
];
