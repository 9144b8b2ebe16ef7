import { Logger } from '@nestjs/common';
import type { PriceInput, PricesService } from '../prices/prices.service';
import type {
  PortfoliosService,
  WeightInput,
} from '../portfolios/portfolios.service';

export type DemoFixture = {
  prices: PriceInput[];
  portfolios: Array<{
    name: string;
    initialValue: string;
    startDate: string;
    weights: WeightInput[];
  }>;
};

const logger = new Logger('SeedDemo');

/**
 * Loads the fixture through the regular services. Safe to run twice:
 * prices are conflict-ignored, portfolios are matched by name and weights
 * are upserted.
 */
export async function seedDemo(
  services: { prices: PricesService; portfolios: PortfoliosService },
  fixture: DemoFixture,
) {
  await services.prices.load(fixture.prices);

  const existing = await services.portfolios.list();
  const ids: number[] = [];

  for (const p of fixture.portfolios) {
    const found = existing.find((e) => e.name === p.name);
    const ref =
      found ??
      (await services.portfolios.create({
        name: p.name,
        initialValue: p.initialValue,
        startDate: p.startDate,
      }));
    if (!found) logger.log(`Created ${ref.name}`);

    await services.portfolios.setWeights(ref.id, p.weights);
    ids.push(ref.id);
  }

  return ids;
}
