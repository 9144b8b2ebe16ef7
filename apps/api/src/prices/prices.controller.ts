import { Body, Controller, Get, Post, Query } from '@nestjs/common';
import { PricesService } from './prices.service';
import { LoadPricesDto } from './dto/load-prices.dto';
import { PricesQueryDto } from './dto/prices-query.dto';

@Controller('prices')
export class PricesController {
  constructor(private readonly pricesService: PricesService) {}

  @Get()
  range(@Query() query: PricesQueryDto) {
    const list = query.symbols
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
    return this.pricesService.range(list, query.from, query.to);
  }

  @Post()
  load(@Body() dto: LoadPricesDto) {
    return this.pricesService.load(dto.prices);
  }
}
