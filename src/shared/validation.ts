/**
 * Input validation utilities
 * Composable validators for configuration values and engine options
 */

import { ValidationError } from './error-handler.js';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export type Validator<T> = (value: T) => ValidationResult;

function createResult(valid: boolean, errors: string[] = []): ValidationResult {
  return { valid, errors };
}

/**
 * Combine multiple validation results
 */
export function combineResults(...results: ValidationResult[]): ValidationResult {
  const allErrors = results.flatMap((r) => r.errors);
  return createResult(allErrors.length === 0, allErrors);
}

/**
 * Validate string matches pattern
 */
export function matchesPattern(
  fieldName: string,
  pattern: RegExp,
  message?: string
): Validator<string> {
  return (value: string) => {
    if (!pattern.test(value)) {
      return createResult(false, [message || `${fieldName} has invalid format`]);
    }
    return createResult(true);
  };
}

export function inRange(
  fieldName: string,
  min?: number,
  max?: number
): Validator<number> {
  return (value: number) => {
    const errors: string[] = [];

    if (min !== undefined && value < min) {
      errors.push(`${fieldName} must be at least ${min}`);
    }

    if (max !== undefined && value > max) {
      errors.push(`${fieldName} must be at most ${max}`);
    }

    return createResult(errors.length === 0, errors);
  };
}

export function isInteger(fieldName: string): Validator<number> {
  return (value: number) => {
    if (!Number.isInteger(value)) {
      return createResult(false, [`${fieldName} must be an integer`]);
    }
    return createResult(true);
  };
}

export function oneOf<T>(fieldName: string, allowed: readonly T[]): Validator<T> {
  return (value: T) => {
    if (!allowed.includes(value)) {
      return createResult(false, [
        `${fieldName} must be one of: ${allowed.join(', ')}`,
      ]);
    }
    return createResult(true);
  };
}

/**
 * Run every validator and merge their errors
 */
export function validate<T>(value: T, validators: Validator<T>[]): ValidationResult {
  return combineResults(...validators.map((validator) => validator(value)));
}

export function validateOrThrow<T>(
  value: T,
  validators: Validator<T>[],
  context?: string
): void {
  const result = validate(value, validators);

  if (!result.valid) {
    throw new ValidationError(
      result.errors.join('; '),
      { value, context },
      'Check input values and try again'
    );
  }
}
