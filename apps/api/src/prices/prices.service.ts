import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import Decimal from 'decimal.js';
import { Between, In, Repository } from 'typeorm';
import { Asset, Price } from '@valuation/db';

export type PriceInput = { symbol: string; date: string; price: string };

export type LoadPricesResult = {
  received: number;
  assetsCreated: string[];
  inserted: number;
  skipped: number;
};

// keeps bound parameters per statement under the sqlite limit
const INSERT_CHUNK = 200;

@Injectable()
export class PricesService {
  private readonly logger = new Logger(PricesService.name);

  constructor(
    @InjectRepository(Asset)
    private readonly assetRepo: Repository<Asset>,
    @InjectRepository(Price)
    private readonly priceRepo: Repository<Price>,
  ) {}

  /**
   * Bulk load of (symbol, date, price) rows. Unknown symbols become assets
   * named after the symbol; (asset, date) pairs that already exist are
   * skipped, never overwritten, so reloading the same data is a no-op.
   */
  async load(rows: PriceInput[]): Promise<LoadPricesResult> {
    const symbols = [...new Set(rows.map((r) => r.symbol))];
    if (!symbols.length) {
      return { received: 0, assetsCreated: [], inserted: 0, skipped: 0 };
    }

    const { ids, existing } = await this.ensureAssets(symbols);
    const assetsCreated = symbols.filter((s) => !existing.has(s));

    const values = rows.map((r) => ({
      assetId: ids[r.symbol],
      date: r.date,
      price: new Decimal(r.price),
    }));

    const before = await this.priceRepo.count();
    for (let i = 0; i < values.length; i += INSERT_CHUNK) {
      await this.priceRepo
        .createQueryBuilder()
        .insert()
        .into(Price)
        .values(values.slice(i, i + INSERT_CHUNK))
        .orIgnore()
        .execute();
    }
    const inserted = (await this.priceRepo.count()) - before;

    const result = {
      received: rows.length,
      assetsCreated,
      inserted,
      skipped: rows.length - inserted,
    };

    this.logger.log(
      `Loaded prices: ${inserted} inserted, ${result.skipped} skipped, ${assetsCreated.length} assets created`,
    );
    return result;
  }

  async range(symbols: string[], from: string, to: string) {
    if (!symbols.length) return [];

    const prices = await this.priceRepo.find({
      where: { asset: { symbol: In(symbols) }, date: Between(from, to) },
      relations: { asset: true },
      order: { date: 'ASC', asset: { symbol: 'ASC' } },
    });

    return prices.map((p) => ({
      symbol: p.asset.symbol,
      date: p.date,
      price: p.price.toFixed(),
    }));
  }

  private async ensureAssets(symbols: string[]) {
    const existing = await this.assetRepo.find({
      where: { symbol: In(symbols) },
      select: { id: true, symbol: true },
    });
    const existingSymbols = new Set(existing.map((a) => a.symbol));

    const missing = symbols.filter((s) => !existingSymbols.has(s));
    if (missing.length) {
      await this.assetRepo
        .createQueryBuilder()
        .insert()
        .into(Asset)
        .values(missing.map((symbol) => ({ symbol, name: symbol })))
        .orIgnore()
        .execute();
    }

    const all = missing.length
      ? await this.assetRepo.find({
          where: { symbol: In(symbols) },
          select: { id: true, symbol: true },
        })
      : existing;

    const ids: Record<string, number> = {};
    for (const a of all) ids[a.symbol] = a.id;

    return { ids, existing: existingSymbols };
  }
}
