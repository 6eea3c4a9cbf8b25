/**
 * Key alphabet
 *
 * Every press the engine understands, plus a text tokenizer so key sequences
 * can be typed as strings like "12.5×4=" or "7[neg]".
 */

import { operatorSymbol, type BinaryOperator } from './operators.js';

export const DIGITS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9] as const;

export type Digit = (typeof DIGITS)[number];

export type CalculatorKey =
  | { kind: 'digit'; value: Digit }
  | { kind: 'decimal' }
  | { kind: 'operator'; operator: BinaryOperator }
  | { kind: 'toggleSign' }
  | { kind: 'percent' }
  | { kind: 'equals' }
  | { kind: 'clear' }
  | { kind: 'undefined'; raw: string };

export type KeyKind = CalculatorKey['kind'];

export const key = {
  digit: (value: Digit): CalculatorKey => ({ kind: 'digit', value }),
  decimal: (): CalculatorKey => ({ kind: 'decimal' }),
  operator: (operator: BinaryOperator): CalculatorKey => ({ kind: 'operator', operator }),
  toggleSign: (): CalculatorKey => ({ kind: 'toggleSign' }),
  percent: (): CalculatorKey => ({ kind: 'percent' }),
  equals: (): CalculatorKey => ({ kind: 'equals' }),
  clear: (): CalculatorKey => ({ kind: 'clear' }),
  unrecognized: (raw: string): CalculatorKey => ({ kind: 'undefined', raw }),
};

export interface KeyAlias {
  key: CalculatorKey;
  tokens: readonly string[];
}

/** Accepted spellings for every non-digit key, matched case-insensitively. */
export const KEY_ALIASES: readonly KeyAlias[] = [
  { key: key.decimal(), tokens: ['.', ','] },
  { key: key.operator('add'), tokens: ['+'] },
  { key: key.operator('subtract'), tokens: ['-', '−'] },
  { key: key.operator('multiply'), tokens: ['*', 'x', '×'] },
  { key: key.operator('divide'), tokens: ['/', '÷'] },
  { key: key.toggleSign(), tokens: ['~', '±', 'neg'] },
  { key: key.percent(), tokens: ['%'] },
  { key: key.equals(), tokens: ['='] },
  { key: key.clear(), tokens: ['c', 'ac', 'esc'] },
];

const TOKEN_PATTERN = /\[([^\]]*)\]|\S/gu;

export function parseKey(token: string): CalculatorKey {
  const digit = DIGITS.find((candidate) => String(candidate) === token);
  if (digit !== undefined) {
    return key.digit(digit);
  }

  const normalized = token.toLowerCase();
  const alias = KEY_ALIASES.find((entry) => entry.tokens.includes(normalized));
  return alias ? alias.key : key.unrecognized(token);
}

/**
 * Split text into key tokens: one per non-space character, except that a
 * bracketed word such as "[neg]" or "[AC]" is a single token.
 */
export function tokenizeKeys(input: string): string[] {
  return Array.from(input.matchAll(TOKEN_PATTERN), (match) => match[1] ?? match[0]);
}

export function parseKeys(input: string): CalculatorKey[] {
  return tokenizeKeys(input).map(parseKey);
}

/** Keypad label for a key, as printed in traces. */
export function describeKey(pressed: CalculatorKey): string {
  switch (pressed.kind) {
    case 'digit':
      return String(pressed.value);
    case 'decimal':
      return '.';
    case 'operator':
      return operatorSymbol(pressed.operator);
    case 'toggleSign':
      return '±';
    case 'percent':
      return '%';
    case 'equals':
      return '=';
    case 'clear':
      return 'C';
    case 'undefined':
      return `?${pressed.raw}`;
    default: {
      const unhandled: never = pressed;
      throw new Error(`Unhandled key: ${JSON.stringify(unhandled)}`);
    }
  }
}
