/**
 * @file src/lib/format.ts
 * @description Text rendering of conversion results.
 */

export const DEFAULT_PRECISION = 6;

const stripFractionZeros = (digits: string): string =>
  digits.includes('.') ? digits.replace(/\.?0+$/, '') : digits;

/**
 * `%g`-style rendering: `precision` significant digits, trailing zeros dropped, exponent
 * notation when the decimal exponent is below -4 or at least `precision`.
 */
export const formatNumber = (value: number, precision: number = DEFAULT_PRECISION): string => {
  if (Number.isNaN(value)) return 'nan';
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
  if (Object.is(value, -0)) return '-0';

  const [mantissa, exponentText] = value.toExponential(precision - 1).split('e');
  const exponent = Number(exponentText);
  if (exponent < -4 || exponent >= precision) {
    const sign = exponent < 0 ? '-' : '+';
    const magnitude = String(Math.abs(exponent)).padStart(2, '0');
    return `${stripFractionZeros(mantissa)}e${sign}${magnitude}`;
  }
  return stripFractionZeros(value.toFixed(Math.max(0, precision - 1 - exponent)));
};

export interface ConversionLine {
  quantity: string;
  fromUnit: string;
  substance?: string;
  value: number;
  toUnit: string;
}

export const formatConversionLine = (
  line: ConversionLine,
  precision: number = DEFAULT_PRECISION,
): string => {
  const substance = line.substance ? ` of ${line.substance}` : '';
  return `  ${line.quantity} ${line.fromUnit}${substance} is ${formatNumber(line.value, precision)} ${line.toUnit}`;
};
