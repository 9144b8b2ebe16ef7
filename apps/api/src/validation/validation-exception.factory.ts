import { BadRequestException } from '@nestjs/common';
import type { ValidationError } from 'class-validator';

export type FieldErrors = Record<string, string[]>;

export function invalidParameters(details: FieldErrors) {
  return new BadRequestException({
    statusCode: 400,
    error: 'Invalid parameters',
    details,
  });
}

function collect(errors: ValidationError[], prefix: string, out: FieldErrors) {
  for (const e of errors) {
    const path = prefix ? `${prefix}.${e.property}` : e.property;
    if (e.constraints) {
      out[path] = [...(out[path] ?? []), ...Object.values(e.constraints)];
    }
    if (e.children?.length) collect(e.children, path, out);
  }
  return out;
}

export function validationExceptionFactory(errors: ValidationError[]) {
  return invalidParameters(collect(errors, '', {}));
}
