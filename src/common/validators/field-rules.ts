import { ValidateIf, ValidationOptions } from 'class-validator';

/** Largest value a `decimal(10,2)` column holds. */
export const MAX_AMOUNT = 99_999_999.99;

/**
 * The field may be left out, but a value that is present, `null` included, is validated.
 * `@IsOptional()` is kept for columns that accept NULL.
 */
export function IsOmittable(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateIf((_object: object, value: unknown) => value !== undefined, validationOptions);
}
