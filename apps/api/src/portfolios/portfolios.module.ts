import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import {
  Asset,
  Holding,
  Portfolio,
  PortfolioWeight,
  Price,
} from '@valuation/db';
import { MetricsController } from './metrics.controller';
import { MetricsService } from './metrics.service';
import { PortfoliosController } from './portfolios.controller';
import { PortfoliosService } from './portfolios.service';
import { QuantitiesService } from './quantities.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      Asset,
      Portfolio,
      PortfolioWeight,
      Holding,
      Price,
    ]),
  ],
  controllers: [PortfoliosController, MetricsController],
  providers: [PortfoliosService, QuantitiesService, MetricsService],
  exports: [PortfoliosService, QuantitiesService],
})
export class PortfoliosModule {}
