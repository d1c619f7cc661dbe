/**
 * Locale-independent string ordering, so rankings are identical across hosts
 */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
