import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { QuantitiesService } from '../portfolios/quantities.service';

// usage: derive-quantities [portfolioId]
async function main() {
  const logger = new Logger('DeriveQuantities');
  const app = await NestFactory.createApplicationContext(AppModule);

  try {
    const quantities = app.get(QuantitiesService);
    const arg = process.argv[2];
    const portfolioId = arg ? Number(arg) : undefined;
    if (
      portfolioId !== undefined &&
      !(Number.isInteger(portfolioId) && portfolioId > 0)
    ) {
      throw new Error(`portfolio id must be a positive integer, got "${arg}"`);
    }

    const results = portfolioId
      ? [await quantities.derive(portfolioId)]
      : await quantities.deriveAll();

    if (!results.length) {
      logger.warn('No portfolios found, load data first');
    }

    for (const r of results) {
      logger.log(
        `${r.portfolio.name}: ${r.holdings.length} holdings, value ${r.totalValue} (diff ${r.difference})`,
      );
    }
  } finally {
    await app.close();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
