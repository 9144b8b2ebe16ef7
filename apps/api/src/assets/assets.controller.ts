import { Body, Controller, Get, Param, Patch } from '@nestjs/common';
import { AssetsService } from './assets.service';
import { RenameAssetDto } from './dto/rename-asset.dto';

@Controller('assets')
export class AssetsController {
  constructor(private readonly assetsService: AssetsService) {}

  @Get()
  list() {
    return this.assetsService.list();
  }

  @Patch(':symbol')
  rename(@Param('symbol') symbol: string, @Body() dto: RenameAssetDto) {
    return this.assetsService.rename(symbol, dto.name);
  }
}
