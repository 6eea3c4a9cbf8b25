import { OperandParseError } from './shared/error-handler.js';
import { err, ok, type Result } from './shared/result.js';

export const DEFAULT_FRACTION_DIGITS = 15;
export const MAX_FRACTION_DIGITS = 15;

const OPERAND_PATTERN = /^-?(?:\d+(?:\.\d*)?(?:e[+-]?\d+)?|Infinity|NaN)$/;

/**
 * Round half away from zero to a fixed number of fractional digits,
 * suppressing binary noise such as 0.1 + 0.2 = 0.30000000000000004.
 */
export function roundResult(value: number, fractionDigits: number = DEFAULT_FRACTION_DIGITS): number {
  if (!Number.isFinite(value)) {
    return value;
  }
  const factor = 10 ** fractionDigits;
  const scaled = Math.abs(value) * factor;
  // Beyond 2^53 every double is already whole at this scale
  if (scaled >= Number.MAX_SAFE_INTEGER) {
    return value;
  }
  return (Math.sign(value) * Math.round(scaled)) / factor;
}

/**
 * Display text for a computed value. Whole numbers carry no decimal point,
 * -0 shows as "0" and non-finite values show as Infinity, -Infinity or NaN.
 */
export function formatNumber(value: number): string {
  return String(value);
}

export function parseOperand(text: string): Result<number, OperandParseError> {
  if (!OPERAND_PATTERN.test(text)) {
    return err(new OperandParseError(text));
  }
  return ok(Number(text));
}
