import { TransformFnParams } from 'class-transformer';

/**
 * Transforms that read the field as it arrived in the payload
 *
 * `enableImplicitConversion` runs `String(value)` or `Number(value)` on a
 * field before validation, so `{a: 1}` would pass `@IsString()` as
 * "[object Object]" and `true` would pass `@IsNumber()` as 1.
 */

export const rawValue = ({ obj, key }: TransformFnParams): unknown => obj[key];

/**
 * Numeric strings become numbers; anything else stays as sent
 */
export const numericValue = ({ obj, key }: TransformFnParams): unknown => {
  const value: unknown = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    return value;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
};
