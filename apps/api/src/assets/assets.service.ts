import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Asset } from '@valuation/db';

@Injectable()
export class AssetsService {
  constructor(
    @InjectRepository(Asset)
    private readonly assetRepo: Repository<Asset>,
  ) {}

  async list() {
    return this.assetRepo.find({
      order: { symbol: 'ASC' },
    });
  }

  // symbol is the asset identity; the display name is the only mutable field
  async rename(symbol: string, name: string) {
    const asset = await this.assetRepo.findOne({ where: { symbol } });
    if (!asset) throw new NotFoundException(`Asset ${symbol} not found`);

    asset.name = name;
    return this.assetRepo.save(asset);
  }
}
