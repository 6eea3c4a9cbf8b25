/**
 * Centralized error handling utilities
 * Error taxonomy for the engine and the CLI, plus formatting helpers
 */

import { Logger } from './logger.js';

// ══════════════════════════════════════════════════════════════════════════════
// ERROR TYPES
// ══════════════════════════════════════════════════════════════════════════════

export type ErrorCode =
  | 'NO_OPERATION'
  | 'MISSING_OPERAND'
  | 'OPERAND_PARSE'
  | 'CONFIGURATION_ERROR'
  | 'VALIDATION_ERROR'
  | 'UNKNOWN_ERROR';

export class CalculatorError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'CalculatorError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Equals was pressed while no binary operator was pending.
 * Recoverable: the engine leaves its state and display untouched.
 */
export class NoOperationError extends CalculatorError {
  constructor(details?: Record<string, unknown>) {
    super(
      'No pending operation to evaluate',
      'NO_OPERATION',
      details,
      'Press an operator (+ - × ÷) before ='
    );
    this.name = 'NoOperationError';
  }
}

/**
 * Percent or equals was pressed before a first operand was typed.
 * Recoverable in the same way as NoOperationError.
 */
export class MissingOperandError extends CalculatorError {
  constructor(details?: Record<string, unknown>) {
    super('No first operand to calculate with', 'MISSING_OPERAND', details, 'Type a number first');
    this.name = 'MissingOperandError';
  }
}

/**
 * An operand buffer held text that is not a number.
 * Only an injected, inconsistent state can produce this.
 */
export class OperandParseError extends CalculatorError {
  constructor(public readonly operand: string, details?: Record<string, unknown>) {
    super(`Operand is not a number: "${operand}"`, 'OPERAND_PARSE', { operand, ...details });
    this.name = 'OperandParseError';
  }
}

export class ConfigurationError extends CalculatorError {
  constructor(message: string, details?: Record<string, unknown>, suggestion?: string) {
    super(message, 'CONFIGURATION_ERROR', details, suggestion);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends CalculatorError {
  constructor(message: string, details?: Record<string, unknown>, suggestion?: string) {
    super(message, 'VALIDATION_ERROR', details, suggestion);
    this.name = 'ValidationError';
  }
}

// ══════════════════════════════════════════════════════════════════════════════
// ERROR UTILITIES
// ══════════════════════════════════════════════════════════════════════════════

/**
 * Safe error message extraction
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}

export function isErrorCode(error: unknown, code: ErrorCode): boolean {
  return error instanceof CalculatorError && error.code === code;
}

/**
 * Format error for user display
 */
export function formatErrorMessage(error: unknown, options?: {
  includeStack?: boolean;
  context?: string;
}): string {
  const parts: string[] = [];

  if (options?.context) {
    parts.push(`${options.context}:`);
  }

  parts.push(getErrorMessage(error));

  if (error instanceof CalculatorError && error.suggestion) {
    parts.push(`\nSuggestion: ${error.suggestion}`);
  }

  if (options?.includeStack && error instanceof Error && error.stack) {
    parts.push(`\nStack trace:\n${error.stack}`);
  }

  return parts.join(' ');
}

/**
 * Convert unknown error to CalculatorError
 */
export function wrapError(error: unknown, context?: string, suggestion?: string): CalculatorError {
  if (error instanceof CalculatorError) {
    return error;
  }

  const message = context
    ? `${context}: ${getErrorMessage(error)}`
    : getErrorMessage(error);

  return new CalculatorError(message, 'UNKNOWN_ERROR', undefined, suggestion);
}

// ══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER
// ══════════════════════════════════════════════════════════════════════════════

export interface ErrorHandlerOptions {
  logger?: Logger;
  exitOnError?: boolean;
  showStack?: boolean;
}

/**
 * Report an error through the logger (or stderr) and optionally exit
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): void {
  const {
    logger,
    exitOnError = false,
    showStack = process.env.DEBUG === 'true',
  } = options;

  const message = formatErrorMessage(error, { includeStack: showStack });

  if (logger) {
    logger.error(message);
    if (error instanceof CalculatorError && error.details) {
      logger.debug('Error details', error.details);
    }
  } else {
    console.error(`❌ ${message}`);
  }

  if (exitOnError) {
    process.exit(1);
  }
}
