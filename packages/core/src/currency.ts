import { Decimal } from 'decimal.js';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';

import { tryParseDecimal } from './utils/decimal-utils.js';

/**
 * Fixed-point amount with four fractional digits.
 * Arithmetic stays in decimal.js; nothing is ever routed through a JS number.
 */
export type Currency = Decimal;

export const CURRENCY_SCALE = 4;

/**
 * Largest integer part an amount may carry. Balances are sums of amounts and
 * decimal.js keeps 28 significant digits, so sums stay exact up to 10^24.
 */
export const CURRENCY_MAX_INTEGER_DIGITS = 14;

const CURRENCY_PATTERN = /^(?:\d+(?:\.\d{0,4})?|\.\d{1,4})$/;

export function zeroCurrency(): Currency {
  return new Decimal(0);
}

/**
 * Parse a wire amount such as `99`, `99.5` or `99.0000`.
 * Returns Err for negative values, exponent notation, more than four fractional digits
 * and integer parts longer than CURRENCY_MAX_INTEGER_DIGITS.
 */
export function parseCurrency(raw: string): Result<Currency, Error> {
  const trimmed = raw.trim();
  if (!CURRENCY_PATTERN.test(trimmed)) {
    return err(new Error(`Invalid amount '${raw}': expected a non-negative decimal with at most ${CURRENCY_SCALE} fractional digits`));
  }

  const integerPart = (trimmed.split('.')[0] ?? '').replace(/^0+/, '');
  if (integerPart.length > CURRENCY_MAX_INTEGER_DIGITS) {
    return err(new Error(`Invalid amount '${raw}': at most ${CURRENCY_MAX_INTEGER_DIGITS} integer digits are supported`));
  }

  const out = { value: zeroCurrency() };
  if (!tryParseDecimal(trimmed, out)) {
    return err(new Error(`Invalid amount '${raw}'`));
  }
  return ok(out.value);
}

/**
 * Build an amount from integer ten-thousandths (`990000` -> `99.0000`).
 */
export function currencyFromUnits(units: number | bigint): Currency {
  return new Decimal(units.toString()).dividedBy(10 ** CURRENCY_SCALE);
}

/** Wire/display form, always four fractional digits */
export function formatCurrency(amount: Currency): string {
  return amount.toFixed(CURRENCY_SCALE);
}

export function currencyEquals(a: Currency, b: Currency): boolean {
  return a.equals(b);
}
