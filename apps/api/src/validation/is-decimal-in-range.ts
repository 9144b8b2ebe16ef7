import {
  ValidateBy,
  buildMessage,
  type ValidationOptions,
} from 'class-validator';
import { parseDecimal } from './decimal';

export const IsDecimalInRange: (
  min: number,
  max: number,
  options?: ValidationOptions,
) => PropertyDecorator = (min, max, options) =>
  ValidateBy(
    {
      name: 'isDecimalInRange',
      constraints: [min, max],
      validator: {
        validate(value: unknown) {
          const d = parseDecimal(value);
          return d !== null && d.gte(min) && d.lte(max);
        },
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must be a decimal between $constraint1 and $constraint2`,
          options,
        ),
      },
    },
    options,
  );
