import { Module } from '@nestjs/common';
import { DatabaseModule } from './database/database.module';
import { AssetsModule } from './assets/assets.module';
import { PricesModule } from './prices/prices.module';
import { PortfoliosModule } from './portfolios/portfolios.module';
import { TransactionsModule } from './transactions/transactions.module';
import { HealthModule } from './health/health.module';

@Module({
  imports: [
    DatabaseModule,
    AssetsModule,
    PricesModule,
    PortfoliosModule,
    TransactionsModule,
    HealthModule,
  ],
})
export class AppModule {}
