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

@Entity('prices')
@Unique(['assetId', 'date'])
export class Price {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  assetId!: number;

  @ManyToOne(() => Asset, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'assetId' })
  asset!: Asset;

  @Index()
  @Column({ type: 'date' })
  date!: string;

  @Column({
    type: 'decimal',
    precision: 15,
    scale: 6,
    transformer: decimalTransformer,
  })
  price!: Decimal;
}
