import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import Decimal from 'decimal.js';
import { Between, In, Repository } from 'typeorm';
import { Holding, Price, calculatePortfolioMetrics } from '@valuation/db';
import { invalidParameters } from '../validation/validation-exception.factory';
import { PortfoliosService } from './portfolios.service';
import { toPortfolioRef } from './portfolio.mapper';
import type { MetricsPoint, PortfolioMetrics } from './portfolio.types';

@Injectable()
export class MetricsService {
  constructor(
    private readonly portfolios: PortfoliosService,
    @InjectRepository(Holding)
    private readonly holdingRepo: Repository<Holding>,
    @InjectRepository(Price)
    private readonly priceRepo: Repository<Price>,
  ) {}

  /**
   * Daily portfolio value, asset values and weights for [from, to] using the
   * quantities fixed at the portfolio start date. A portfolio whose
   * quantities were never derived has an empty series.
   */
  async metrics(
    portfolioId: number,
    from: string,
    to: string,
  ): Promise<PortfolioMetrics> {
    if (from > to) {
      throw invalidParameters({
        fecha_fin: ['fecha_fin must be on or after fecha_inicio'],
      });
    }

    const portfolio = await this.portfolios.findOrFail(portfolioId);

    const holdings = await this.holdingRepo.find({
      where: { portfolioId, date: portfolio.startDate },
    });

    let metrics: MetricsPoint[] = [];

    if (holdings.length) {
      const quantities = new Map(holdings.map((h) => [h.assetId, h.quantity]));

      const prices = await this.priceRepo.find({
        where: {
          assetId: In([...quantities.keys()]),
          date: Between(from, to),
        },
        relations: { asset: true },
        order: { date: 'ASC', assetId: 'ASC' },
      });

      metrics = calculatePortfolioMetrics(
        quantities,
        prices.map((p) => ({
          date: p.date,
          assetId: p.assetId,
          symbol: p.asset.symbol,
          price: p.price,
        })),
      ).map((day) => {
        // published total is the sum of the published (cent) asset values
        const cents = mapValues(day.assetValues, (v) => v.toDecimalPlaces(2));
        const total = Object.values(cents).reduce(
          (acc, v) => acc.add(v),
          new Decimal(0),
        );
        return {
          date: day.date,
          portfolioValue: total.toFixed(2),
          weights: mapValues(day.weights, (w) => w.toNumber()),
          assetValues: mapValues(cents, (v) => v.toFixed(2)),
        };
      });
    }

    return {
      portfolio: toPortfolioRef(portfolio),
      query: {
        portfolio_id: portfolio.id,
        fecha_inicio: from,
        fecha_fin: to,
        total_days: metrics.length,
      },
      metrics,
    };
  }
}

function mapValues<T, R>(
  record: Record<string, T>,
  fn: (value: T) => R,
): Record<string, R> {
  const out: Record<string, R> = {};
  for (const [k, v] of Object.entries(record)) out[k] = fn(v);
  return out;
}
