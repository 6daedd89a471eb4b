import { Decimal } from 'decimal.js';

// Balances are sums of 4-place amounts; see CURRENCY_MAX_INTEGER_DIGITS for the bound this precision implies.
Decimal.set({
  maxE: 9e15,
  minE: -9e15,
  modulo: Decimal.ROUND_HALF_UP,
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 21,
});

/**
 * Try to parse a string to a Decimal
 */
export function tryParseDecimal(value: string | Decimal | undefined | null, out?: { value: Decimal }): boolean {
  if (value === undefined || value === null || value === '') {
    if (out) out.value = new Decimal(0);
    return true;
  }

  try {
    const decimal = new Decimal(value);
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}
