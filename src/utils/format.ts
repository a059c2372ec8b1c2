/**
 * Fixed-width number rendering (printf "%W.Pf")
 */

// Extra digits inspected to tell an exact binary tie from a near one
const TIE_GUARD_DIGITS = 20;
const TIE_TAIL = '5'.padEnd(TIE_GUARD_DIGITS, '0');

/**
 * Round a non-negative number to `precision` digits, ties to even.
 * toFixed rounds exact ties away from zero.
 */
function toFixedHalfEven(magnitude: number, precision: number): string {
  const rounded = magnitude.toFixed(precision);
  if (magnitude >= 1e21) {
    return rounded;
  }

  const exact = magnitude.toFixed(precision + TIE_GUARD_DIGITS);
  const cut = exact.length - TIE_GUARD_DIGITS;
  if (exact.slice(cut) !== TIE_TAIL) {
    return rounded;
  }

  let truncated = exact.slice(0, cut);
  if (truncated.endsWith('.')) {
    truncated = truncated.slice(0, -1);
  }
  const lastDigit = Number(truncated.charAt(truncated.length - 1));
  return lastDigit % 2 === 0 ? truncated : rounded;
}

/**
 * Render a number right-aligned in `width` characters with `precision`
 * fractional digits. Non-finite values render as nan / inf / -inf.
 */
export function formatFixed(value: number, width: number, precision: number): string {
  let text: string;
  if (Number.isNaN(value)) {
    text = 'nan';
  } else if (value === Infinity) {
    text = 'inf';
  } else if (value === -Infinity) {
    text = '-inf';
  } else {
    const negative = value < 0 || Object.is(value, -0);
    text = (negative ? '-' : '') + toFixedHalfEven(Math.abs(value), precision);
  }
  return text.padStart(width);
}

/**
 * True for NaN (the "missing value" marker of numeric fields)
 */
export function isNaNValue(value: number): boolean {
  return value !== value;
}
