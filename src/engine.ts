/**
 * Calculator Engine
 *
 * A state machine turning key presses into a running expression and the
 * display text. State lives in one engine instance and changes only through
 * handle(); every other member is a read-only query.
 */

import { describeKey, type CalculatorKey } from './keys.js';
import {
  DEFAULT_FRACTION_DIGITS,
  MAX_FRACTION_DIGITS,
  formatNumber,
  parseOperand,
  roundResult,
} from './number-format.js';
import { OperandBuffer } from './operand-buffer.js';
import { applyOperator, type BinaryOperator } from './operators.js';
import {
  CalculatorError,
  MissingOperandError,
  NoOperationError,
} from './shared/error-handler.js';
import { logger as rootLogger, type Logger } from './shared/logger.js';
import { err, ok, type Result } from './shared/result.js';
import { inRange, isInteger, validateOrThrow } from './shared/validation.js';

export type CalculatorPhase =
  | 'AwaitingFirstOperand'
  | 'AwaitingOperator'
  | 'AwaitingSecondOperand';

export type ActiveOperand = 'first' | 'second';

/**
 * Plain record of everything the engine holds. Decimal-point flags are not
 * stored: they follow from the operand text.
 */
export interface CalculatorSnapshot {
  first: string;
  second: string;
  pending: BinaryOperator | null;
  display: string;
}

export const INITIAL_SNAPSHOT: Readonly<CalculatorSnapshot> = Object.freeze({
  first: '',
  second: '',
  pending: null,
  display: '0',
});

export interface CalculatorEngineOptions {
  logger?: Logger;
  /** Fractional digits kept when rounding computed results (0-15). */
  fractionDigits?: number;
  /** Starting state; not validated until an arithmetic key reads it. */
  state?: CalculatorSnapshot;
}

export class CalculatorEngine {
  private readonly first: OperandBuffer;
  private readonly second: OperandBuffer;
  private pending: BinaryOperator | null;
  private displayText: string;
  private readonly logger: Logger;
  private readonly fractionDigits: number;

  constructor(options: CalculatorEngineOptions = {}) {
    const fractionDigits = options.fractionDigits ?? DEFAULT_FRACTION_DIGITS;
    validateOrThrow(
      fractionDigits,
      [isInteger('fractionDigits'), inRange('fractionDigits', 0, MAX_FRACTION_DIGITS)],
      'CalculatorEngine'
    );

    const state = options.state ?? INITIAL_SNAPSHOT;
    this.first = new OperandBuffer(state.first);
    this.second = new OperandBuffer(state.second);
    this.pending = state.pending;
    this.displayText = state.display || '0';
    this.fractionDigits = fractionDigits;
    this.logger = (options.logger ?? rootLogger).child({ scope: 'engine' });
  }

  get display(): string {
    return this.displayText;
  }

  get pendingOperator(): BinaryOperator | null {
    return this.pending;
  }

  get firstOperand(): string {
    return this.first.value;
  }

  get secondOperand(): string {
    return this.second.value;
  }

  get activeOperand(): ActiveOperand {
    return this.pending === null ? 'first' : 'second';
  }

  get phase(): CalculatorPhase {
    if (this.pending !== null) {
      return 'AwaitingSecondOperand';
    }
    return this.first.isEmpty ? 'AwaitingFirstOperand' : 'AwaitingOperator';
  }

  snapshot(): CalculatorSnapshot {
    return {
      first: this.first.value,
      second: this.second.value,
      pending: this.pending,
      display: this.displayText,
    };
  }

  /**
   * Apply one key press. Errors come back as values and leave the state
   * exactly as it was before the key.
   */
  handle(pressed: CalculatorKey): Result<string, CalculatorError> {
    const outcome = this.dispatch(pressed);
    if (outcome.ok) {
      this.logger.debug('key', { key: describeKey(pressed), display: this.displayText });
    }
    return outcome;
  }

  /**
   * handle() for UI callers that only want the display text.
   */
  press(pressed: CalculatorKey): string {
    const outcome = this.handle(pressed);
    if (!outcome.ok) {
      this.logger.warn(outcome.error.message, {
        code: outcome.error.code,
        key: describeKey(pressed),
      });
    }
    return this.displayText;
  }

  private get active(): OperandBuffer {
    return this.pending === null ? this.first : this.second;
  }

  private dispatch(pressed: CalculatorKey): Result<string, CalculatorError> {
    switch (pressed.kind) {
      case 'digit':
        this.active.appendDigit(pressed.value);
        this.displayText = this.active.displayText;
        break;
      case 'decimal':
        if (this.active.appendDecimalPoint()) {
          this.displayText = this.active.displayText;
        }
        break;
      case 'operator':
        // Replaces any pending operator; a partial second operand is kept
        this.pending = pressed.operator;
        this.displayText = this.second.displayText;
        break;
      case 'toggleSign':
        this.toggleSign();
        break;
      case 'percent':
        return this.percent();
      case 'equals':
        return this.equals();
      case 'clear':
        this.first.clear();
        this.second.clear();
        this.pending = null;
        this.displayText = '0';
        break;
      case 'undefined':
        this.displayText = '0';
        break;
      default: {
        const unhandled: never = pressed;
        throw new Error(`Unhandled key: ${JSON.stringify(unhandled)}`);
      }
    }
    return ok(this.displayText);
  }

  private toggleSign(): void {
    if (this.displayText === '0') {
      return;
    }
    const toggled = this.displayText.startsWith('-')
      ? this.displayText.slice(1)
      : `-${this.displayText}`;
    this.active.replace(toggled);
    this.displayText = toggled;
  }

  private percent(): Result<string, CalculatorError> {
    const lhs = this.readFirst();
    if (!lhs.ok) {
      return lhs;
    }

    if (this.pending === null) {
      return ok(this.commit(lhs.value / 100));
    }
    if (this.second.isEmpty) {
      return ok(this.commit((lhs.value * lhs.value) / 100));
    }

    const rhs = parseOperand(this.second.value);
    if (!rhs.ok) {
      return rhs;
    }
    return ok(this.commit((lhs.value * rhs.value) / 100));
  }

  private equals(): Result<string, CalculatorError> {
    if (this.pending === null) {
      return err(new NoOperationError({ display: this.displayText }));
    }

    const lhs = this.readFirst();
    if (!lhs.ok) {
      return lhs;
    }
    // With no second operand the first is used twice: 5 + = gives 10
    const rhs = this.second.isEmpty ? lhs : parseOperand(this.second.value);
    if (!rhs.ok) {
      return rhs;
    }
    return ok(this.commit(applyOperator(this.pending, lhs.value, rhs.value)));
  }

  /** The placeholder "0" of an empty first buffer is not an operand. */
  private readFirst(): Result<number, CalculatorError> {
    if (this.first.isEmpty) {
      return err(new MissingOperandError({ display: this.displayText }));
    }
    return parseOperand(this.first.value);
  }

  private commit(result: number): string {
    const text = formatNumber(roundResult(result, this.fractionDigits));
    this.first.replace(text);
    this.second.clear();
    this.pending = null;
    this.displayText = this.first.displayText;
    this.logger.debug('result', { value: text });
    return this.displayText;
  }
}
