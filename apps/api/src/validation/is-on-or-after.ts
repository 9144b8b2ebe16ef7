import {
  ValidateBy,
  buildMessage,
  type ValidationArguments,
  type ValidationOptions,
} from 'class-validator';
import { isIsoDate } from './is-iso-date';

// Only compares when both sides are valid dates; format errors are reported
// by IsIsoDate on each field.
export const IsOnOrAfter: (
  property: string,
  options?: ValidationOptions,
) => PropertyDecorator = (property, options) =>
  ValidateBy(
    {
      name: 'isOnOrAfter',
      constraints: [property],
      validator: {
        validate(value: unknown, args?: ValidationArguments) {
          const other: unknown = args
            ? Reflect.get(args.object, property)
            : undefined;
          if (!isIsoDate(value) || !isIsoDate(other)) return true;
          return value >= other;
        },
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must be on or after $constraint1`,
          options,
        ),
      },
    },
    options,
  );
