// ═══════════════════════════════════════════════════════
// helpers.ts — Pure utility functions (zero dependencies)
// ═══════════════════════════════════════════════════════

/** Safe division with configurable decimal places (0 when den is 0) */
export function safeDiv(num: number, den: number, decimals = 2): number {
  if (den === 0) return 0;
  return +((num / den).toFixed(decimals));
}

/** Count distinct values, e.g. to log how many filter ids survived dedup */
export function distinctCount<T>(values: Iterable<T>): number {
  return new Set(values).size;
}
