import { Controller, Get, Query } from '@nestjs/common';
import { MetricsQueryDto } from './dto/metrics-query.dto';
import { MetricsService } from './metrics.service';

@Controller('metrics')
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  @Get()
  metrics(@Query() query: MetricsQueryDto) {
    return this.metricsService.metrics(
      query.portfolio_id,
      query.fecha_inicio,
      query.fecha_fin,
    );
  }
}
