import Decimal from 'decimal.js';
import {
  Column,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { decimalTransformer } from '../decimal.transformer';
import { Asset } from './asset.entity';
import { Portfolio } from './portfolio.entity';

/** Initial allocation of an asset as a 0..1 fraction of the initial value. */
@Entity('portfolio_weights')
@Unique(['portfolioId', 'assetId'])
export class PortfolioWeight {
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

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 8,
    transformer: decimalTransformer,
  })
  weight!: Decimal;
}
