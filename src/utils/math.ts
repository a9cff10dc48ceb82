/**
 * @fileoverview Math and number-formatting utilities
 *
 * The formatters pin down the exact text of coverage summaries and
 * agreement reasons, which downstream reporting parses.
 */

/**
 * Clamp a value to [0, 1].
 */
export function clamp01(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

function nonFinite(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  return value > 0 ? 'inf' : '-inf';
}

function splitExponential(text: string): { mantissa: string; exponent: number } {
  const [mantissa, exponent] = text.split('e');
  return { mantissa, exponent: Number(exponent) };
}

function formatExponent(exponent: number): string {
  const sign = exponent < 0 ? '-' : '+';
  return `e${sign}${String(Math.abs(exponent)).padStart(2, '0')}`;
}

function trimFraction(text: string): string {
  if (!text.includes('.')) return text;
  return text.replace(/0+$/, '').replace(/\.$/, '');
}

/**
 * The exact binary value of a finite double as `mantissa * 2^exponent`.
 */
function binaryParts(value: number): { negative: boolean; mantissa: bigint; exponent: number } {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  const bits = view.getBigUint64(0);
  const biased = Number((bits >> 52n) & 0x7ffn);
  const fraction = bits & 0xfffffffffffffn;
  return {
    negative: bits >> 63n === 1n,
    mantissa: biased === 0 ? fraction : fraction | (1n << 52n),
    exponent: biased === 0 ? -1074 : biased - 1075,
  };
}

/**
 * |value| * 10^places rounded to an integer, ties to even. Works on the
 * exact binary value, so 0.0625 at three places is a tie and becomes 62.
 */
function roundScaled(value: number, places: number): bigint {
  const { mantissa, exponent } = binaryParts(value);
  let numerator = exponent >= 0 ? mantissa << BigInt(exponent) : mantissa;
  let divisor = exponent >= 0 ? 1n : 1n << BigInt(-exponent);
  if (places >= 0) {
    numerator *= 10n ** BigInt(places);
  } else {
    divisor *= 10n ** BigInt(-places);
  }

  const quotient = numerator / divisor;
  const twiceRemainder = (numerator % divisor) * 2n;
  if (twiceRemainder > divisor || (twiceRemainder === divisor && quotient % 2n === 1n)) {
    return quotient + 1n;
  }
  return quotient;
}

/**
 * Fixed-point rendering with `digits` decimals, rounding exact ties to
 * even: formatFixed(1 / 16, 3) === '0.062', formatFixed(2 / 3, 3) === '0.667'.
 */
export function formatFixed(value: number, digits: number): string {
  if (!Number.isFinite(value)) return nonFinite(value);

  const text = roundScaled(value, digits).toString().padStart(digits + 1, '0');
  const body = digits > 0 ? `${text.slice(0, -digits)}.${text.slice(-digits)}` : text;
  return binaryParts(value).negative ? `-${body}` : body;
}

/**
 * Decimal exponent of `value` once rounded to `precision` significant digits.
 */
function roundedExponent(value: number, precision: number): number {
  let exponent = splitExponential(value.toExponential()).exponent;
  for (;;) {
    const digits = roundScaled(value, precision - 1 - exponent);
    if (digits >= 10n ** BigInt(precision)) {
      exponent += 1;
    } else if (digits < 10n ** BigInt(precision - 1)) {
      exponent -= 1;
    } else {
      return exponent;
    }
  }
}

/**
 * General format with `precision` significant digits: fixed notation unless
 * the exponent is below -4 or at least `precision`, trailing zeros removed.
 * formatGeneral(20) === '20', formatGeneral(0.000012345) === '1.2345e-05'.
 */
export function formatGeneral(value: number, precision = 6): string {
  if (!Number.isFinite(value)) return nonFinite(value);
  if (value === 0) return Object.is(value, -0) ? '-0' : '0';

  const exponent = roundedExponent(value, precision);
  if (exponent < -4 || exponent >= precision) {
    const digits = roundScaled(value, precision - 1 - exponent).toString();
    const mantissa = precision > 1 ? `${digits[0]}.${digits.slice(1)}` : digits;
    const sign = value < 0 ? '-' : '';
    return `${sign}${trimFraction(mantissa)}${formatExponent(exponent)}`;
  }
  return trimFraction(formatFixed(value, precision - 1 - exponent));
}

/**
 * Shortest round-trip rendering that always marks a float: 1 -> '1.0',
 * 0.5 -> '0.5', 1e-05 -> '1e-05'.
 */
export function formatFloat(value: number): string {
  if (!Number.isFinite(value)) return nonFinite(value);
  if (value === 0) return Object.is(value, -0) ? '-0.0' : '0.0';

  const { mantissa, exponent } = splitExponential(value.toExponential());
  if (exponent < -4 || exponent >= 16) {
    return `${mantissa}${formatExponent(exponent)}`;
  }
  if (Number.isInteger(value)) {
    return `${value.toFixed(0)}.0`;
  }
  return String(value);
}
