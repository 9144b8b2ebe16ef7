import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import Decimal from 'decimal.js';
import { Repository } from 'typeorm';
import { Asset, Portfolio, Transaction } from '@valuation/db';
import { CreateTransactionDto } from './dto/create-transaction.dto';

function toView(tx: Transaction) {
  return {
    id: tx.id,
    portfolioId: tx.portfolioId,
    symbol: tx.asset.symbol,
    type: tx.type,
    date: tx.date,
    amount: tx.amount.toFixed(2),
    notes: tx.notes,
    createdAt: tx.createdAt,
  };
}

/**
 * Buy/sell records kept alongside a portfolio. Holdings stay fixed at their
 * start-date quantities; nothing here feeds the valuation.
 */
@Injectable()
export class TransactionsService {
  constructor(
    @InjectRepository(Transaction)
    private readonly transactionRepo: Repository<Transaction>,
    @InjectRepository(Portfolio)
    private readonly portfolioRepo: Repository<Portfolio>,
    @InjectRepository(Asset)
    private readonly assetRepo: Repository<Asset>,
  ) {}

  private async ensurePortfolio(portfolioId: number) {
    const exists = await this.portfolioRepo.exists({
      where: { id: portfolioId },
    });
    if (!exists) throw new NotFoundException('Portfolio not found');
  }

  async create(dto: CreateTransactionDto) {
    await this.ensurePortfolio(dto.portfolioId);

    const asset = await this.assetRepo.findOne({
      where: { symbol: dto.assetSymbol },
    });
    if (!asset) throw new NotFoundException('Asset not found');

    const saved = await this.transactionRepo.save(
      this.transactionRepo.create({
        portfolioId: dto.portfolioId,
        assetId: asset.id,
        type: dto.type,
        date: dto.date,
        amount: new Decimal(dto.amount),
        notes: dto.notes ?? '',
      }),
    );

    return toView({ ...saved, asset });
  }

  async list(portfolioId?: number) {
    if (portfolioId !== undefined) await this.ensurePortfolio(portfolioId);

    const txs = await this.transactionRepo.find({
      where: portfolioId !== undefined ? { portfolioId } : {},
      relations: { asset: true },
      order: { date: 'DESC', createdAt: 'DESC' },
    });
    return txs.map(toView);
  }
}
