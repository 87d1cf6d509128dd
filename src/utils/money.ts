// Prices are stored in pounds; arithmetic happens in whole pence.

export function toPence(amount: number): number {
  return Math.round(amount * 100);
}

export function fromPence(pence: number): number {
  return pence / 100;
}

export function lineTotal(unitPrice: number, qty: number): number {
  return fromPence(toPence(unitPrice) * qty);
}

export function sumTotals(amounts: number[]): number {
  return fromPence(amounts.reduce((sum, amount) => sum + toPence(amount), 0));
}

/**
 * Accepts admin input such as `9.99`, `"9.99"`, `"£9.99"` or `"9,99"`.
 * Returns `null` when the value is not a non-negative number.
 */
export function parsePrice(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  if (typeof value !== 'string') return null;
  const cleaned = value.trim().replace('£', '').replace(',', '.').trim();
  if (!/^\d+(\.\d+)?$/.test(cleaned)) return null;
  return Number(cleaned);
}
