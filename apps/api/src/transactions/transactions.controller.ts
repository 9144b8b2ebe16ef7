import { Body, Controller, Get, ParseIntPipe, Post, Query } from '@nestjs/common';
import { TransactionsService } from './transactions.service';
import { CreateTransactionDto } from './dto/create-transaction.dto';

@Controller('transactions')
export class TransactionsController {
  constructor(private readonly transactionsService: TransactionsService) {}

  @Post()
  create(@Body() dto: CreateTransactionDto) {
    return this.transactionsService.create(dto);
  }

  @Get()
  list(
    @Query('portfolioId', new ParseIntPipe({ optional: true }))
    portfolioId?: number,
  ) {
    return this.transactionsService.list(portfolioId);
  }
}
