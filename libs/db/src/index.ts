export * from './entities';
export * from './client';
export * from './decimal.transformer';
export * from './calc/initial-quantities';
export * from './calc/portfolio-metrics';
export * from './calc/weights';
export * from './calc/decimal';
