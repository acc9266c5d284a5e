/**
 * UTC timestamp for terminal output, second precision
 */
export function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)}Z`;
}

/**
 * Plain decimal with trailing zeros trimmed. Exchanges reject exponent
 * notation such as 1e-7 in query strings.
 */
export function toDecimalString(value: number, decimals: number = 8): string {
  const fixed = value.toFixed(decimals);
  if (!fixed.includes('.')) return fixed;
  return fixed.replace(/0+$/, '').replace(/\.$/, '');
}

/**
 * Round to `decimals` places. Halves go toward +Infinity, as with `Math.round`.
 */
export function round(value: number, decimals: number = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
