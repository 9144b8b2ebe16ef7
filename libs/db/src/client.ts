import type { DataSourceOptions } from 'typeorm';
import { entities } from './entities';

export const dataSourceOptions = (): DataSourceOptions => ({
  type: 'postgres',
  url: process.env.DATABASE_URL ?? 'postgres://localhost:5432/valuation',
  entities,
  synchronize: process.env.DB_SYNCHRONIZE === 'true',
  logging: process.env.DB_LOGGING === 'true',
});
