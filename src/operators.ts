/**
 * Binary operators of a four-function calculator
 */

export const BINARY_OPERATORS = ['add', 'subtract', 'multiply', 'divide'] as const;

export type BinaryOperator = (typeof BINARY_OPERATORS)[number];

export function isBinaryOperator(value: unknown): value is BinaryOperator {
  return typeof value === 'string' && BINARY_OPERATORS.some((operator) => operator === value);
}

/**
 * Apply an operator with plain IEEE-754 semantics.
 * Division by zero yields Infinity, -Infinity or NaN rather than throwing.
 */
export function applyOperator(operator: BinaryOperator, lhs: number, rhs: number): number {
  switch (operator) {
    case 'add':
      return lhs + rhs;
    case 'subtract':
      return lhs - rhs;
    case 'multiply':
      return lhs * rhs;
    case 'divide':
      return lhs / rhs;
    default: {
      const unhandled: never = operator;
      throw new Error(`Unhandled operator: ${String(unhandled)}`);
    }
  }
}

export function operatorSymbol(operator: BinaryOperator): string {
  switch (operator) {
    case 'add':
      return '+';
    case 'subtract':
      return '−';
    case 'multiply':
      return '×';
    case 'divide':
      return '÷';
    default: {
      const unhandled: never = operator;
      throw new Error(`Unhandled operator: ${String(unhandled)}`);
    }
  }
}
