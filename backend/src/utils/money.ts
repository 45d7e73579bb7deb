export const MAX_AMOUNT = 10_000_000;

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

// Exact: a value with more than two decimals does not survive the round trip.
export function hasAtMostTwoDecimals(amount: number): boolean {
  return fromCents(toCents(amount)) === amount;
}
