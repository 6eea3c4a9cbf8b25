import chalk from 'chalk';
import type { CalculatorSnapshot } from './engine.js';
import { DIGITS, KEY_ALIASES, describeKey } from './keys.js';
import { operatorSymbol } from './operators.js';
import type { SessionStep } from './session.js';

export function formatTraceLine(step: SessionStep, index: number): string {
  const position = String(index + 1).padStart(3);
  const line = `${position}  ${step.label.padEnd(4)} → ${step.display}`;
  return step.error ? `${line}  ${chalk.yellow(`(${step.error.code})`)}` : line;
}

export function formatState(snapshot: CalculatorSnapshot): string[] {
  const empty = chalk.dim('(empty)');
  return [
    `display: ${snapshot.display}`,
    `first:   ${snapshot.first || empty}`,
    `pending: ${snapshot.pending ? operatorSymbol(snapshot.pending) : chalk.dim('(none)')}`,
    `second:  ${snapshot.second || empty}`,
  ];
}

export function formatKeyTable(): string[] {
  const rows = [
    { label: '0-9', tokens: [DIGITS.join('')] },
    ...KEY_ALIASES.map((alias) => ({ label: describeKey(alias.key), tokens: [...alias.tokens] })),
  ];
  return rows.map((row) => `  ${chalk.bold(row.label.padEnd(4))} ${row.tokens.map(formatToken).join('  ')}`);
}

// Word tokens must be bracketed when typed inside a key string
function formatToken(token: string): string {
  return /^[a-z]{2,}$/.test(token) ? `[${token}]` : token;
}

export function printDisplay(display: string): void {
  console.log(chalk.bold(display));
}

export function printLines(lines: string[]): void {
  lines.forEach((line) => console.log(line));
}

export function printError(message: string): void {
  console.log(chalk.red('❌'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.cyan('ℹ️'), message);
}

export function printHeader(message: string): void {
  console.log(chalk.bold(message));
}
