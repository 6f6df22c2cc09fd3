import { Decimal } from 'decimal.js';
import { ValidationError } from '@tiered/errors';

export function toDecimal(value: string, field: string): Decimal {
  let parsed: Decimal;
  try {
    parsed = new Decimal(value);
  } catch {
    throw new ValidationError(`${field} is not a decimal number`, { field, value });
  }
  if (!parsed.isFinite()) {
    throw new ValidationError(`${field} must be finite`, { field, value });
  }
  return parsed;
}

export function toPositiveDecimal(value: string, field: string): Decimal {
  const parsed = toDecimal(value, field);
  if (!parsed.isPositive() || parsed.isZero()) {
    throw new ValidationError(`${field} must be positive`, { field, value });
  }
  return parsed;
}

/**
 * Truncates toward zero at `decimals` places, the way exchanges apply tick and lot sizes.
 */
export function roundDown(value: Decimal, decimals: number): Decimal {
  return value.toDecimalPlaces(decimals, Decimal.ROUND_DOWN);
}

export function decimalPlaces(value: string): number {
  return new Decimal(value).decimalPlaces();
}

export { Decimal };
