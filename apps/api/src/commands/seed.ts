import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { PricesService } from '../prices/prices.service';
import { PortfoliosService } from '../portfolios/portfolios.service';
import { seedDemo, type DemoFixture } from './seed-demo';
import demo from './fixtures/demo.json';

async function main() {
  const app = await NestFactory.createApplicationContext(AppModule);
  try {
    const fixture: DemoFixture = demo;
    await seedDemo(
      { prices: app.get(PricesService), portfolios: app.get(PortfoliosService) },
      fixture,
    );
  } finally {
    await app.close();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
