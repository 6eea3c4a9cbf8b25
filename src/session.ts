import type { CalculatorEngine } from './engine.js';
import { describeKey, parseKeys, type CalculatorKey } from './keys.js';
import type { CalculatorError } from './shared/error-handler.js';
import type { Logger } from './shared/logger.js';

export interface SessionStep {
  key: CalculatorKey;
  label: string;
  display: string;
  error?: CalculatorError;
}

/**
 * Feed keys to an engine in order, recording the display after each one.
 * A key that errors is recorded and the run carries on.
 */
export function runKeys(engine: CalculatorEngine, keys: Iterable<CalculatorKey>): SessionStep[] {
  const steps: SessionStep[] = [];
  for (const pressed of keys) {
    const outcome = engine.handle(pressed);
    const step: SessionStep = {
      key: pressed,
      label: describeKey(pressed),
      display: engine.display,
    };
    if (!outcome.ok) {
      step.error = outcome.error;
    }
    steps.push(step);
  }
  return steps;
}

export function runInput(engine: CalculatorEngine, input: string): SessionStep[] {
  return runKeys(engine, parseKeys(input));
}

export function failedSteps(steps: readonly SessionStep[]): SessionStep[] {
  return steps.filter((step) => step.error !== undefined);
}

/**
 * Log every recovered key error at warn.
 */
export function reportFailedSteps(steps: readonly SessionStep[], logger: Logger): void {
  for (const step of failedSteps(steps)) {
    if (step.error) {
      logger.warn(step.error.message, { code: step.error.code, key: step.label });
    }
  }
}
