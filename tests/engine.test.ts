/**
 * Tests for the calculator engine state machine
 */

import assert from 'node:assert/strict';
import { Writable } from 'node:stream';
import { CalculatorEngine, INITIAL_SNAPSHOT } from '../src/engine.js';
import { key, parseKeys } from '../src/keys.js';
import {
  MissingOperandError,
  NoOperationError,
  OperandParseError,
  ValidationError,
} from '../src/shared/error-handler.js';
import { Logger, type LogRecord } from '../src/shared/logger.js';
import { exitOnRunnerFailure, runSuite, test } from './harness.js';

class NullWritable extends Writable {
  _write(_chunk: unknown, _encoding: string, callback: (error?: Error | null) => void) {
    callback();
  }
}

function quietEngine(options: ConstructorParameters<typeof CalculatorEngine>[0] = {}): CalculatorEngine {
  return new CalculatorEngine({
    logger: new Logger({ level: 'error', destination: new NullWritable() }),
    ...options,
  });
}

function type(engine: CalculatorEngine, input: string): string {
  for (const pressed of parseKeys(input)) {
    engine.handle(pressed);
  }
  return engine.display;
}

runSuite('Calculator engine', [
  test('starts empty with display 0', () => {
    const engine = quietEngine();
    assert.equal(engine.display, '0');
    assert.equal(engine.pendingOperator, null);
    assert.equal(engine.phase, 'AwaitingFirstOperand');
    assert.equal(engine.activeOperand, 'first');
    assert.deepEqual(engine.snapshot(), INITIAL_SNAPSHOT);
  }),

  test('typed digits display exactly as typed', () => {
    assert.equal(type(quietEngine(), '12034'), '12034');
    assert.equal(type(quietEngine(), '007'), '007');
  }),

  test('first digit replaces the placeholder 0', () => {
    const engine = quietEngine();
    const outcome = engine.handle(key.digit(8));
    assert.deepEqual(outcome, { ok: true, value: '8' });
    assert.equal(engine.phase, 'AwaitingOperator');
  }),

  test('1.5 + 2.5 = shows 4 without a decimal point', () => {
    const engine = quietEngine();
    assert.equal(type(engine, '1.5+2.5='), '4');
    assert.equal(engine.firstOperand, '4');
    assert.equal(engine.secondOperand, '');
    assert.equal(engine.pendingOperator, null);
  }),

  test('equals with no second operand reuses the first', () => {
    assert.equal(type(quietEngine(), '5+='), '10');
    assert.equal(type(quietEngine(), '6×='), '36');
  }),

  test('0.1 + 0.2 rounds to 0.3', () => {
    assert.equal(type(quietEngine(), '0.1+0.2='), '0.3');
  }),

  test('results of 9 and above pass through rounding unchanged', () => {
    assert.equal(type(quietEngine(), '9.2+0.1='), '9.299999999999999');
  }),

  test('subtraction can go negative', () => {
    assert.equal(type(quietEngine(), '1-1.5='), '-0.5');
  }),

  test('percent without operator divides by 100', () => {
    assert.equal(type(quietEngine(), '50%'), '0.5');
  }),

  test('percent with empty second operand squares the first', () => {
    const engine = quietEngine();
    assert.equal(type(engine, '4+%'), '0.16');
    assert.equal(engine.pendingOperator, null);
    assert.equal(engine.firstOperand, '0.16');
  }),

  test('percent with both operands multiplies them', () => {
    const engine = quietEngine();
    assert.equal(type(engine, '200+50%'), '100');
    assert.equal(engine.secondOperand, '');
    assert.equal(engine.phase, 'AwaitingOperator');
  }),

  test('percent before any digit changes nothing', () => {
    const engine = quietEngine();
    const outcome = engine.handle(key.percent());
    assert.equal(outcome.ok, false);
    if (!outcome.ok) {
      assert.ok(outcome.error instanceof MissingOperandError);
      assert.equal(outcome.error.code, 'MISSING_OPERAND');
    }
    assert.deepEqual(engine.snapshot(), INITIAL_SNAPSHOT);
    assert.equal(type(engine, '5'), '5');
    assert.equal(engine.firstOperand, '5');
  }),

  test('equals with an operator but no first operand changes nothing', () => {
    const engine = quietEngine();
    type(engine, '+');
    const before = engine.snapshot();
    const outcome = engine.handle(key.equals());
    assert.equal(outcome.ok, false);
    if (!outcome.ok) {
      assert.ok(outcome.error instanceof MissingOperandError);
    }
    assert.deepEqual(engine.snapshot(), before);
    assert.deepEqual(before, { first: '', second: '', pending: 'add', display: '0' });
    assert.equal(type(engine, '5'), '5');
    assert.equal(engine.secondOperand, '5');
    assert.equal(engine.firstOperand, '');
  }),

  test('operator switches to the second operand', () => {
    const engine = quietEngine();
    assert.equal(type(engine, '9+'), '0');
    assert.equal(engine.pendingOperator, 'add');
    assert.equal(engine.phase, 'AwaitingSecondOperand');
    assert.equal(engine.activeOperand, 'second');
    assert.equal(type(engine, '4'), '4');
    assert.equal(engine.firstOperand, '9');
    assert.equal(type(engine, '='), '13');
  }),

  test('second operator overwrites the first without evaluating', () => {
    const engine = quietEngine();
    assert.equal(type(engine, '2+3×'), '3');
    assert.equal(engine.pendingOperator, 'multiply');
    assert.equal(engine.firstOperand, '2');
    assert.equal(engine.secondOperand, '3');
    assert.equal(type(engine, '='), '6');
  }),

  test('sign toggle is a no-op on 0', () => {
    const engine = quietEngine();
    assert.equal(type(engine, '~'), '0');
    assert.equal(engine.firstOperand, '');
  }),

  test('sign toggle flips and restores', () => {
    const engine = quietEngine();
    assert.equal(type(engine, '5~'), '-5');
    assert.equal(engine.firstOperand, '-5');
    assert.equal(type(engine, '~'), '5');
    assert.equal(engine.firstOperand, '5');
  }),

  test('sign toggle writes into the second operand', () => {
    const engine = quietEngine();
    assert.equal(type(engine, '3+4~'), '-4');
    assert.equal(engine.secondOperand, '-4');
    assert.equal(engine.firstOperand, '3');
    assert.equal(type(engine, '='), '-1');
  }),

  test('second decimal point in a buffer changes nothing', () => {
    const engine = quietEngine();
    assert.equal(type(engine, '1.'), '1.');
    assert.equal(type(engine, '.'), '1.');
    assert.equal(type(engine, '5'), '1.5');
    assert.equal(type(engine, '.'), '1.5');
    assert.equal(engine.firstOperand, '1.5');
  }),

  test('decimal point on an empty buffer inserts a leading 0', () => {
    const engine = quietEngine();
    assert.equal(type(engine, '.'), '0.');
    assert.equal(type(engine, '+.'), '0.');
    assert.equal(engine.secondOperand, '0.');
  }),

  test('division by zero displays Infinity', () => {
    const engine = quietEngine();
    const outcomes = parseKeys('5÷0=').map((pressed) => engine.handle(pressed));
    assert.ok(outcomes.every((outcome) => outcome.ok));
    assert.equal(engine.display, 'Infinity');
  }),

  test('negative over zero and zero over zero', () => {
    assert.equal(type(quietEngine(), '5~÷0='), '-Infinity');
    assert.equal(type(quietEngine(), '0÷0='), 'NaN');
  }),

  test('typing after an Infinity result starts a new number', () => {
    const engine = quietEngine();
    type(engine, '5÷0=');
    assert.equal(type(engine, '7'), '7');
    assert.equal(engine.firstOperand, '7');
  }),

  test('typing after a plain result extends it', () => {
    const engine = quietEngine();
    type(engine, '1.5+2.5=');
    assert.equal(type(engine, '3'), '43');
  }),

  test('decimal point after a fractional result is ignored', () => {
    const engine = quietEngine();
    type(engine, '0.1+0.2=');
    assert.equal(type(engine, '.'), '0.3');
    assert.equal(engine.firstOperand, '0.3');
  }),

  test('equals without a pending operator is a recoverable error', () => {
    const engine = quietEngine();
    type(engine, '7');
    const outcome = engine.handle(key.equals());
    assert.equal(outcome.ok, false);
    if (!outcome.ok) {
      assert.ok(outcome.error instanceof NoOperationError);
      assert.equal(outcome.error.code, 'NO_OPERATION');
    }
    assert.equal(engine.display, '7');
    assert.equal(engine.firstOperand, '7');
  }),

  test('unrecognized key resets only the display', () => {
    const engine = quietEngine();
    type(engine, '12');
    assert.deepEqual(engine.handle(key.unrecognized('?')), { ok: true, value: '0' });
    assert.equal(engine.firstOperand, '12');
    assert.equal(type(engine, '3'), '123');
  }),

  test('clear restores the initial state from any phase', () => {
    for (const input of ['', '8', '8×', '8×3', '8×3=', '5÷0=', '1.5~']) {
      const engine = quietEngine();
      type(engine, input);
      assert.equal(type(engine, 'c'), '0');
      assert.equal(engine.pendingOperator, null);
      assert.deepEqual(engine.snapshot(), INITIAL_SNAPSHOT);
    }
  }),

  test('injected state is used as the starting point', () => {
    const engine = quietEngine({
      state: { first: '12', second: '3', pending: 'divide', display: '3' },
    });
    assert.equal(engine.phase, 'AwaitingSecondOperand');
    assert.equal(type(engine, '='), '4');
  }),

  test('corrupt injected operand surfaces OperandParseError', () => {
    const state = { first: 'abc', second: '', pending: 'add' as const, display: 'abc' };
    const engine = quietEngine({ state });
    const outcome = engine.handle(key.equals());
    assert.equal(outcome.ok, false);
    if (!outcome.ok) {
      assert.ok(outcome.error instanceof OperandParseError);
      assert.equal(outcome.error.operand, 'abc');
    }
    assert.deepEqual(engine.snapshot(), state);
  }),

  test('fractionDigits controls rounding', () => {
    assert.equal(type(quietEngine({ fractionDigits: 2 }), '2÷3='), '0.67');
  }),

  test('fractionDigits outside 0-15 is rejected', () => {
    assert.throws(() => new CalculatorEngine({ fractionDigits: 16 }), ValidationError);
    assert.throws(() => new CalculatorEngine({ fractionDigits: 1.5 }), ValidationError);
  }),

  test('press returns the display and logs recovered errors', () => {
    const records: LogRecord[] = [];
    const logger = new Logger({
      level: 'warn',
      destination: new NullWritable(),
      sink: (record) => records.push(record),
    });
    const engine = new CalculatorEngine({ logger });

    assert.equal(engine.press(key.digit(3)), '3');
    assert.equal(engine.press(key.equals()), '3');
    assert.equal(records.length, 1);
    assert.equal(records[0].level, 'warn');
    assert.equal(records[0].scope, 'engine');
    assert.equal(records[0].message, 'No pending operation to evaluate');
    assert.equal(records[0].code, 'NO_OPERATION');
    assert.equal(records[0].key, '=');
  }),
]).catch(exitOnRunnerFailure);
