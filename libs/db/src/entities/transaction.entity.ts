import Decimal from 'decimal.js';
import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { decimalTransformer } from '../decimal.transformer';
import { Asset } from './asset.entity';
import { Portfolio } from './portfolio.entity';

export type TransactionType = 'BUY' | 'SELL';

// Recorded for reference only; valuation never reads it.
@Entity('transactions')
@Index(['portfolioId', 'date'])
export class Transaction {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  portfolioId!: number;

  @ManyToOne(() => Portfolio, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'portfolioId' })
  portfolio!: Portfolio;

  @Column()
  assetId!: number;

  @ManyToOne(() => Asset, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'assetId' })
  asset!: Asset;

  @Column({ type: 'varchar', length: 4 })
  type!: TransactionType;

  @Column({ type: 'date' })
  date!: string;

  @Column({
    type: 'decimal',
    precision: 15,
    scale: 2,
    transformer: decimalTransformer,
  })
  amount!: Decimal;

  @Column({ type: 'text', default: '' })
  notes!: string;

  @CreateDateColumn()
  createdAt!: Date;
}
