import { registerDecorator, ValidationOptions } from 'class-validator';
import { isValid, parse } from 'date-fns';

const TRADE_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** yyyy-MM-dd that names a real calendar day (rejects 2024-02-31) */
export function isTradeDate(value: unknown): value is string {
  return (
    typeof value === 'string' &&
    TRADE_DATE_PATTERN.test(value) &&
    isValid(parse(value, 'yyyy-MM-dd', new Date()))
  );
}

export function IsTradeDate(validationOptions?: ValidationOptions): PropertyDecorator {
  return (target: object, propertyName: string | symbol) => {
    registerDecorator({
      name: 'isTradeDate',
      target: target.constructor,
      propertyName: propertyName.toString(),
      options: { message: '$property must be a calendar date formatted as yyyy-MM-dd', ...validationOptions },
      validator: { validate: isTradeDate },
    });
  };
}
