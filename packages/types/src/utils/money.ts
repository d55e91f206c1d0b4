export function roundToTwoDecimals(num: number): number {
  return Math.round(num * 100) / 100;
}

/**
 * Flip a provider amount (positive = money out) into the ledger convention
 * (positive = money in). Zero stays a plain 0, never -0.
 */
export function invertAmount(providerAmount: number): number {
  const inverted = roundToTwoDecimals(providerAmount * -1);
  return inverted === 0 ? 0 : inverted;
}

/**
 * Postgres `numeric` arrives as a number through PostgREST and as a string
 * through `pg`; accept both.
 */
export function toNullableNumber(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  const num = typeof value === 'number' ? value : Number(value);
  if (Number.isNaN(num)) {
    throw new Error(`Unable to parse amount: ${String(value)}`);
  }
  return num;
}
