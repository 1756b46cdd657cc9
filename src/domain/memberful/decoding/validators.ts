import { ValidateBy, ValidationOptions, buildMessage } from 'class-validator';

export type ChangePair<T> = readonly [T | null, T | null];

/**
 * Integer unix timestamp first, otherwise a datetime string
 */
export const IsTimestampOrDateString = (
  validationOptions?: ValidationOptions,
): PropertyDecorator =>
  ValidateBy(
    {
      name: 'isTimestampOrDateString',
      validator: {
        validate: (value: unknown): boolean =>
          Number.isInteger(value) || typeof value === 'string',
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must be an integer timestamp or a datetime string`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );

/**
 * `[old, new]` pair where each side matches `check` or is null
 */
export const IsChangePair = (
  check: (value: unknown) => boolean,
  description: string,
  validationOptions?: ValidationOptions,
): PropertyDecorator =>
  ValidateBy(
    {
      name: 'isChangePair',
      constraints: [description],
      validator: {
        validate: (value: unknown): boolean =>
          Array.isArray(value) &&
          value.length === 2 &&
          value.every((side) => side === null || check(side)),
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must be an [old, new] pair of $constraint1 values`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );

export const isStringValue = (value: unknown): boolean =>
  typeof value === 'string';

export const isIntegerValue = (value: unknown): boolean =>
  Number.isInteger(value);

export const isBooleanValue = (value: unknown): boolean =>
  typeof value === 'boolean';

export const isAnyValue = (): boolean => true;
