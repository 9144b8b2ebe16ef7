import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import Decimal from 'decimal.js';
import { In, Repository } from 'typeorm';
import {
  Asset,
  Holding,
  Portfolio,
  PortfolioWeight,
  checkWeightsSum,
} from '@valuation/db';
import { CreatePortfolioDto } from './dto/create-portfolio.dto';
import { toPortfolioRef } from './portfolio.mapper';
import type {
  PortfolioListItem,
  PortfolioSummary,
  SetWeightsResult,
} from './portfolio.types';

export type WeightInput = { symbol: string; weight: string };

@Injectable()
export class PortfoliosService {
  private readonly logger = new Logger(PortfoliosService.name);

  constructor(
    @InjectRepository(Portfolio)
    private readonly portfolioRepo: Repository<Portfolio>,
    @InjectRepository(PortfolioWeight)
    private readonly weightRepo: Repository<PortfolioWeight>,
    @InjectRepository(Holding)
    private readonly holdingRepo: Repository<Holding>,
    @InjectRepository(Asset)
    private readonly assetRepo: Repository<Asset>,
  ) {}

  async create(dto: CreatePortfolioDto) {
    const portfolio = await this.portfolioRepo.save(
      this.portfolioRepo.create({
        name: dto.name,
        initialValue: new Decimal(dto.initialValue),
        startDate: dto.startDate,
      }),
    );
    return toPortfolioRef(portfolio);
  }

  async list(): Promise<PortfolioListItem[]> {
    const portfolios = await this.portfolioRepo.find({
      order: { name: 'ASC' },
    });
    if (!portfolios.length) return [];

    const weights = await this.weightRepo.find({
      where: { portfolioId: In(portfolios.map((p) => p.id)) },
      relations: { asset: true },
      order: { asset: { symbol: 'ASC' } },
    });

    return portfolios.map((p) => ({
      ...toPortfolioRef(p),
      weights: weights
        .filter((w) => w.portfolioId === p.id)
        .map((w) => ({
          symbol: w.asset.symbol,
          weight: w.weight.toNumber(),
          weightPercentage: w.weight.mul(100).toNumber(),
        })),
    }));
  }

  async findOrFail(portfolioId: number) {
    const portfolio = await this.portfolioRepo.findOne({
      where: { id: portfolioId },
    });
    if (!portfolio) {
      throw new NotFoundException(`Portfolio ${portfolioId} not found`);
    }
    return portfolio;
  }

  /** Static snapshot: initial weights and start-date quantities. */
  async summary(portfolioId: number): Promise<PortfolioSummary> {
    const portfolio = await this.findOrFail(portfolioId);

    const weights = await this.weightRepo.find({
      where: { portfolioId },
      relations: { asset: true },
      order: { asset: { symbol: 'ASC' } },
    });

    const holdings = await this.holdingRepo.find({
      where: { portfolioId, date: portfolio.startDate },
    });
    const quantityByAsset = new Map(
      holdings.map((h) => [h.assetId, h.quantity]),
    );

    const check = checkWeightsSum(weights.map((w) => w.weight));

    return {
      ...toPortfolioRef(portfolio),
      totalAssets: weights.length,
      weightsTotal: check.total.toFixed(),
      assets: weights.map((w) => ({
        symbol: w.asset.symbol,
        name: w.asset.name,
        initialWeight: w.weight.toNumber(),
        initialQuantity: (
          quantityByAsset.get(w.assetId) ?? new Decimal(0)
        ).toFixed(),
      })),
    };
  }

  /**
   * Upserts initial weights by symbol; an existing (portfolio, asset) weight
   * is overwritten. Symbols with no asset row are skipped.
   */
  async setWeights(
    portfolioId: number,
    items: WeightInput[],
  ): Promise<SetWeightsResult> {
    const portfolio = await this.findOrFail(portfolioId);

    // last entry wins for repeated symbols
    const bySymbol = new Map(items.map((i) => [i.symbol, i.weight]));
    const symbols = [...bySymbol.keys()];

    const assets = await this.assetRepo.find({
      where: { symbol: In(symbols) },
    });
    const assetBySymbol = new Map(assets.map((a) => [a.symbol, a]));

    const skipped = symbols.filter((s) => !assetBySymbol.has(s));
    if (skipped.length) {
      this.logger.warn(
        `${portfolio.name}: unknown assets skipped: ${skipped.join(', ')}`,
      );
    }

    const rows = assets.map((a) => ({
      portfolioId,
      assetId: a.id,
      weight: new Decimal(bySymbol.get(a.symbol) ?? 0),
    }));
    if (rows.length) {
      await this.weightRepo.upsert(rows, ['portfolioId', 'assetId']);
    }

    const stored = await this.weightRepo.find({ where: { portfolioId } });
    const check = checkWeightsSum(stored.map((w) => w.weight));
    if (!check.balanced) {
      this.logger.warn(
        `${portfolio.name}: weights sum to ${check.total.toFixed()} instead of 1`,
      );
    }

    return {
      updated: rows.length,
      skipped,
      total: check.total.toFixed(),
      balanced: check.balanced,
    };
  }
}
