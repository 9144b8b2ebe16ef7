import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { validationExceptionFactory } from '../../validation/validation-exception.factory';
import { MetricsQueryDto } from './metrics-query.dto';

async function check(query: Record<string, string>) {
  const dto = plainToInstance(MetricsQueryDto, query);
  return { dto, errors: await validate(dto) };
}

describe('MetricsQueryDto', () => {
  it('accepts a valid query and coerces the id', async () => {
    const { dto, errors } = await check({
      portfolio_id: '1',
      fecha_inicio: '2022-02-15',
      fecha_fin: '2022-02-15',
    });

    expect(errors).toEqual([]);
    expect(dto.portfolio_id).toBe(1);
  });

  it('rejects a reversed range on fecha_fin', async () => {
    const { errors } = await check({
      portfolio_id: '1',
      fecha_inicio: '2022-03-01',
      fecha_fin: '2022-02-01',
    });

    expect(validationExceptionFactory(errors).getResponse()).toEqual({
      statusCode: 400,
      error: 'Invalid parameters',
      details: { fecha_fin: ['fecha_fin must be on or after fecha_inicio'] },
    });
  });

  it('rejects impossible calendar days', async () => {
    const { errors } = await check({
      portfolio_id: '1',
      fecha_inicio: '2022-02-30',
      fecha_fin: '2022-03-01',
    });

    expect(errors.map((e) => e.property)).toEqual(['fecha_inicio']);
    expect(errors[0].constraints).toEqual({
      isIsoDate: 'fecha_inicio must be a date in YYYY-MM-DD format',
    });
  });

  it('reports every missing parameter', async () => {
    const { errors } = await check({});

    expect(errors.map((e) => e.property).sort()).toEqual([
      'fecha_fin',
      'fecha_inicio',
      'portfolio_id',
    ]);
  });

  it('rejects a non-numeric portfolio id', async () => {
    const { errors } = await check({
      portfolio_id: 'abc',
      fecha_inicio: '2022-02-15',
      fecha_fin: '2022-02-16',
    });

    expect(errors.map((e) => e.property)).toEqual(['portfolio_id']);
  });
});
