// ─── Presentation helpers ──────────────────────────────────────────────────

/** Float noise within this many epsilons of the value is not worth an extra producer. */
export const ROUNDING_EPSILONS = 4;

export type TotalsSort = 'none' | 'name' | 'desc';

export interface FormatOptions {
  sort?: TotalsSort;
  /** Print fractional values instead of rounding up */
  raw?: boolean;
}

/** Ceiling: any fractional requirement needs one more whole unit. */
export function roundUp(value: number): number {
  // max() also turns the -0 from ceil(-noise) into 0
  const noise = Number.EPSILON * Math.max(1, Math.abs(value)) * ROUNDING_EPSILONS;
  return Math.max(0, Math.ceil(value - noise));
}

export function sortTotals(totals: Record<string, number>, sort: TotalsSort = 'none'): [string, number][] {
  const entries = Object.entries(totals);
  switch (sort) {
    case 'name':
      return entries.sort(([a], [b]) => a.localeCompare(b));
    case 'desc':
      return entries.sort(([a, x], [b, y]) => y - x || a.localeCompare(b));
    case 'none':
      return entries;
  }
}

function formatValue(value: number, raw: boolean): string {
  if (!raw) return String(roundUp(value));
  return Number.isInteger(value) ? String(value) : value.toFixed(3);
}

/** One `name : quantity` line per entry. */
export function formatTotals(totals: Record<string, number>, options: FormatOptions = {}): string[] {
  const { sort = 'none', raw = false } = options;
  return sortTotals(totals, sort).map(([name, value]) => `${name} : ${formatValue(value, raw)}`);
}

/**
 * Show totals in a human friendly way, rounded up to whole units.
 */
export function humanize(
  totals: Record<string, number>,
  print: (line: string) => void = console.log,
  options: FormatOptions = {},
): void {
  for (const line of formatTotals(totals, options)) print(line);
}
