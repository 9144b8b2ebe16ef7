import {
  ValidateBy,
  buildMessage,
  type ValidationOptions,
} from 'class-validator';
import { parseDecimal } from './decimal';

// Accepts decimal strings with a comma or a point, and finite numbers.
export const IsPositiveDecimal: (
  options?: ValidationOptions,
) => PropertyDecorator = (options) =>
  ValidateBy(
    {
      name: 'isPositiveDecimal',
      validator: {
        validate: (value: unknown) => parseDecimal(value)?.gt(0) ?? false,
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be a decimal above 0`,
          options,
        ),
      },
    },
    options,
  );
