import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import Decimal from 'decimal.js';
import { DataSource, In, Repository } from 'typeorm';
import {
  DEFAULT_RECONCILIATION_TOLERANCE,
  Holding,
  Portfolio,
  PortfolioWeight,
  Price,
  calculateInitialQuantities,
} from '@valuation/db';
import { PortfoliosService } from './portfolios.service';
import { toPortfolioRef } from './portfolio.mapper';
import type { DerivedQuantities } from './portfolio.types';

/** RECONCILIATION_TOLERANCE when it holds a decimal >= 0, else the default. */
export function reconciliationTolerance(
  raw = process.env.RECONCILIATION_TOLERANCE,
): Decimal {
  if (!raw) return DEFAULT_RECONCILIATION_TOLERANCE;
  try {
    const tolerance = new Decimal(raw);
    return tolerance.gte(0) ? tolerance : DEFAULT_RECONCILIATION_TOLERANCE;
  } catch {
    return DEFAULT_RECONCILIATION_TOLERANCE;
  }
}

@Injectable()
export class QuantitiesService {
  private readonly logger = new Logger(QuantitiesService.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly portfolios: PortfoliosService,
    @InjectRepository(PortfolioWeight)
    private readonly weightRepo: Repository<PortfolioWeight>,
    @InjectRepository(Price)
    private readonly priceRepo: Repository<Price>,
  ) {}

  /**
   * Derives the fixed unit quantities of one portfolio and replaces its
   * start-date holdings. The delete and the insert share one transaction,
   * so readers see either the previous holdings or the new ones.
   */
  async derive(portfolioId: number): Promise<DerivedQuantities> {
    const portfolio = await this.portfolios.findOrFail(portfolioId);
    const startDate = portfolio.startDate;

    const weights = await this.weightRepo.find({
      where: { portfolioId },
      relations: { asset: true },
      order: { asset: { symbol: 'ASC' } },
    });

    if (!weights.length) {
      this.logger.warn(`${portfolio.name}: no weights to derive from`);
    }

    const prices = weights.length
      ? await this.priceRepo.find({
          where: {
            assetId: In(weights.map((w) => w.assetId)),
            date: startDate,
          },
        })
      : [];
    const startPrices = new Map(prices.map((p) => [p.assetId, p.price]));

    const calc = calculateInitialQuantities(
      portfolio.initialValue,
      weights.map((w) => ({
        assetId: w.assetId,
        symbol: w.asset.symbol,
        weight: w.weight,
      })),
      startPrices,
      reconciliationTolerance(),
    );

    await this.dataSource.transaction(async (manager) => {
      await manager.delete(Holding, { portfolioId, date: startDate });
      if (calc.holdings.length) {
        await manager.insert(
          Holding,
          calc.holdings.map((h) => ({
            portfolioId,
            assetId: h.assetId,
            date: startDate,
            quantity: h.quantity,
          })),
        );
      }
    });

    const missingPrices = calc.warnings?.missingPrices;
    if (missingPrices) {
      this.logger.warn(
        `${portfolio.name}: no price on ${startDate} for ${missingPrices.join(', ')}`,
      );
    }

    const gap = calc.warnings?.reconciliation;
    if (gap) {
      this.logger.warn(
        `${portfolio.name}: holdings value ${gap.actual.toFixed(2)} differs from initial value ${gap.expected.toFixed(2)} by ${gap.difference.toFixed(2)}`,
      );
    }

    this.logger.log(
      `${portfolio.name}: ${calc.holdings.length} holdings derived for ${startDate}`,
    );

    return {
      portfolio: toPortfolioRef(portfolio),
      holdings: calc.holdings.map((h) => ({
        symbol: h.symbol,
        weight: h.weight.toFixed(),
        price: h.price.toFixed(),
        quantity: h.quantity.toFixed(),
        value: h.value.toFixed(2),
      })),
      totalValue: calc.totalValue.toFixed(2),
      difference: calc.difference.toFixed(2),
      warnings:
        calc.warnings || !weights.length
          ? {
              noWeights: weights.length ? undefined : true,
              missingPrices,
              reconciliation: gap
                ? {
                    expected: gap.expected.toFixed(2),
                    actual: gap.actual.toFixed(2),
                    difference: gap.difference.toFixed(2),
                  }
                : undefined,
            }
          : undefined,
    };
  }

  async deriveAll(): Promise<DerivedQuantities[]> {
    const portfolios = await this.dataSource.getRepository(Portfolio).find({
      order: { name: 'ASC' },
      select: { id: true },
    });

    const results: DerivedQuantities[] = [];
    for (const p of portfolios) results.push(await this.derive(p.id));
    return results;
  }
}
