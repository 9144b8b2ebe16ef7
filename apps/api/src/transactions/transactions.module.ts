import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Asset, Portfolio, Transaction } from '@valuation/db';
import { TransactionsController } from './transactions.controller';
import { TransactionsService } from './transactions.service';

@Module({
  imports: [TypeOrmModule.forFeature([Transaction, Portfolio, Asset])],
  controllers: [TransactionsController],
  providers: [TransactionsService],
})
export class TransactionsModule {}
