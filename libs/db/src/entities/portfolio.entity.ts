import Decimal from 'decimal.js';
import {
  Column,
  CreateDateColumn,
  Entity,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { decimalTransformer } from '../decimal.transformer';

@Entity('portfolios')
export class Portfolio {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  // V_0
  @Column({
    type: 'decimal',
    precision: 15,
    scale: 2,
    transformer: decimalTransformer,
  })
  initialValue!: Decimal;

  @Column({ type: 'date' })
  startDate!: string;

  @CreateDateColumn()
  createdAt!: Date;
}
