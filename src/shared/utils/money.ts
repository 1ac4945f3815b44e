/**
 * Fixed-point money helpers.
 *
 * Amounts are carried as integer micro-dollars (1e-6 USD) while they are
 * multiplied and summed, and converted back to a number once at the end.
 * Every unit price in the table has at most four decimals, so prices and
 * hourly products are exact in this representation.
 */

const MICROS_PER_DOLLAR = 1_000_000;

/**
 * Hours billed per month for time-rate resources.
 */
export const HOURS_PER_MONTH = 730;

/**
 * Convert a dollar amount to whole micro-dollars.
 */
export function toMicros(amount: number): bigint {
  return BigInt(Math.round(amount * MICROS_PER_DOLLAR));
}

/**
 * Convert micro-dollars back to dollars.
 */
export function fromMicros(micros: bigint): number {
  return Number(micros) / MICROS_PER_DOLLAR;
}

/**
 * Price × quantity, rounded to the nearest micro-dollar. Negative inputs
 * are clamped to zero.
 */
export function multiplyPrice(unitPrice: number, quantity: number): number {
  if (!(unitPrice > 0) || !(quantity > 0)) {
    return 0;
  }
  const priceMicros = Number(toMicros(unitPrice));
  return fromMicros(BigInt(Math.round(priceMicros * quantity)));
}

/**
 * Order-independent sum of dollar amounts.
 */
export function sumAmounts(amounts: Iterable<number>): number {
  let total = 0n;
  for (const amount of amounts) {
    total += toMicros(amount);
  }
  return fromMicros(total);
}

/**
 * Round for display, e.g. 17.592 -> "17.59".
 */
export function formatCurrency(amount: number): string {
  return (Math.round(amount * 100) / 100).toFixed(2);
}

/**
 * Round to two decimals, e.g. for running hours and GiB figures.
 */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
