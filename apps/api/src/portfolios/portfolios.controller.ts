import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Put,
} from '@nestjs/common';
import { PortfoliosService } from './portfolios.service';
import { QuantitiesService } from './quantities.service';
import { CreatePortfolioDto } from './dto/create-portfolio.dto';
import { SetWeightsDto } from './dto/set-weights.dto';

@Controller('portfolios')
export class PortfoliosController {
  constructor(
    private readonly portfoliosService: PortfoliosService,
    private readonly quantitiesService: QuantitiesService,
  ) {}

  @Post()
  create(@Body() dto: CreatePortfolioDto) {
    return this.portfoliosService.create(dto);
  }

  @Get()
  list() {
    return this.portfoliosService.list();
  }

  @Get(':id')
  summary(@Param('id', ParseIntPipe) id: number) {
    return this.portfoliosService.summary(id);
  }

  @Put(':id/weights')
  setWeights(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: SetWeightsDto,
  ) {
    return this.portfoliosService.setWeights(id, dto.weights);
  }

  @Post(':id/quantities')
  deriveQuantities(@Param('id', ParseIntPipe) id: number) {
    return this.quantitiesService.derive(id);
  }
}
