import Decimal from 'decimal.js';
import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { decimalTransformer } from '../decimal.transformer';
import { Asset } from './asset.entity';
import { Portfolio } from './portfolio.entity';

/**
 * Units of an asset held by a portfolio. Only written at the
 * portfolio start date; later dates reuse that quantity.
 */
@Entity('holdings')
@Unique(['portfolioId', 'assetId', 'date'])
@Index(['portfolioId', 'date'])
export class Holding {
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

  @Column({ type: 'date' })
  date!: string;

  @Column({
    type: 'decimal',
    precision: 20,
    scale: 8,
    transformer: decimalTransformer,
  })
  quantity!: Decimal;
}
