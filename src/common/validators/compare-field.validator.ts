import { registerDecorator, ValidationArguments, ValidationOptions } from 'class-validator';
import { isBeforeDate, isCalendarDate } from '../dates';

function relatedValue(args: ValidationArguments, property: string): unknown {
  return Reflect.get(args.object, property);
}

/** `YYYY-MM-DD` calendar date. */
export function IsCalendarDate(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isCalendarDate',
      target: object.constructor,
      propertyName,
      options: {
        message: `${propertyName} must be a date in YYYY-MM-DD format`,
        ...validationOptions,
      },
      validator: {
        validate: (value: unknown) => isCalendarDate(value),
      },
    });
  };
}

/** Calendar date on or after the date in `property`. Skipped while either side is absent. */
export function IsOnOrAfter(property: string, validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isOnOrAfter',
      target: object.constructor,
      propertyName,
      constraints: [property],
      options: {
        message: `${propertyName} must be on or after ${property}`,
        ...validationOptions,
      },
      validator: {
        validate(value: unknown, args: ValidationArguments) {
          const other = relatedValue(args, property);
          if (!isCalendarDate(value) || !isCalendarDate(other)) return true;
          return !isBeforeDate(value, other);
        },
      },
    });
  };
}

/** Number not greater than the number in `property`. Skipped while either side is absent. */
export function IsNotGreaterThan(property: string, validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isNotGreaterThan',
      target: object.constructor,
      propertyName,
      constraints: [property],
      options: {
        message: `${propertyName} cannot exceed ${property}`,
        ...validationOptions,
      },
      validator: {
        validate(value: unknown, args: ValidationArguments) {
          const other = relatedValue(args, property);
          if (typeof value !== 'number' || typeof other !== 'number') return true;
          return value <= other;
        },
      },
    });
  };
}
