/**
 * Line handling for the interactive calculator.
 * Kept free of readline so it can be driven directly.
 */

import type { CalculatorEngine, CalculatorSnapshot } from './engine.js';
import { key } from './keys.js';
import { runInput, type SessionStep } from './session.js';

export const REPL_COMMANDS: ReadonlyArray<{ name: string; description: string }> = [
  { name: '.state', description: 'Show operands and pending operator' },
  { name: '.clear', description: 'Reset the calculator' },
  { name: '.help', description: 'List commands' },
  { name: '.exit', description: 'Quit' },
];

// ".5+1=" is key input; only a dot followed by letters is a command
const COMMAND_PATTERN = /^\.[a-z]+$/i;

export type ReplOutcome =
  | { type: 'keys'; display: string; steps: SessionStep[] }
  | { type: 'state'; snapshot: CalculatorSnapshot }
  | { type: 'help' }
  | { type: 'exit' }
  | { type: 'unknown-command'; command: string };

export function evaluateLine(engine: CalculatorEngine, line: string): ReplOutcome {
  const trimmed = line.trim();

  if (COMMAND_PATTERN.test(trimmed)) {
    switch (trimmed.toLowerCase()) {
      case '.exit':
      case '.quit':
        return { type: 'exit' };
      case '.state':
        return { type: 'state', snapshot: engine.snapshot() };
      case '.help':
        return { type: 'help' };
      case '.clear':
        engine.handle(key.clear());
        return { type: 'keys', display: engine.display, steps: [] };
      default:
        return { type: 'unknown-command', command: trimmed };
    }
  }

  const steps = runInput(engine, trimmed);
  return { type: 'keys', display: engine.display, steps };
}
