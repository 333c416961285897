/**
 * Milliunit helpers. YNAB stores money as integers, 1000 milliunits per unit.
 */

export function milliunitsToAmount(milliunits: number): number {
  return milliunits / 1000;
}

/**
 * Display string for a milliunit amount: `$` then the unit value with two
 * decimals, sign after the symbol (`-10500` renders as `$-10.50`).
 */
export function formatAmount(milliunits: number, currencySymbol = '$'): string {
  return `${currencySymbol}${milliunitsToAmount(milliunits).toFixed(2)}`;
}

export function formatOptionalAmount(milliunits: number | null | undefined): string | null {
  return milliunits === null || milliunits === undefined ? null : formatAmount(milliunits);
}
