/**
 * Runtime configuration
 *
 * Settings come from TAPCALC_* environment variables; CLI flags passed as
 * overrides win over the environment. Every value is validated and all
 * problems are reported together.
 */

import { DEFAULT_FRACTION_DIGITS, MAX_FRACTION_DIGITS } from './number-format.js';
import { ConfigurationError } from './shared/error-handler.js';
import { LOG_LEVELS, logger as rootLogger, type LogLevel, type Logger } from './shared/logger.js';
import {
  combineResults,
  inRange,
  isInteger,
  matchesPattern,
  oneOf,
  validate,
  type ValidationResult,
} from './shared/validation.js';

export interface CalculatorConfig {
  logLevel: LogLevel;
  jsonLogs: boolean;
  fractionDigits: number;
}

/** Unparsed values, as they arrive from the environment or the command line. */
export interface RawConfig {
  logLevel?: string;
  jsonLogs?: string | boolean;
  fractionDigits?: string;
}

export const ENV_VARS = {
  logLevel: 'TAPCALC_LOG_LEVEL',
  jsonLogs: 'TAPCALC_JSON_LOGS',
  fractionDigits: 'TAPCALC_FRACTION_DIGITS',
} as const;

export const DEFAULT_CONFIG: Readonly<CalculatorConfig> = Object.freeze({
  logLevel: 'warn',
  jsonLogs: false,
  fractionDigits: DEFAULT_FRACTION_DIGITS,
});

const TRUE_VALUES = ['true', '1', 'yes'];
const FALSE_VALUES = ['false', '0', 'no'];

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: RawConfig = {}
): CalculatorConfig {
  const raw: RawConfig = {
    logLevel: overrides.logLevel ?? env[ENV_VARS.logLevel],
    jsonLogs: overrides.jsonLogs ?? env[ENV_VARS.jsonLogs],
    fractionDigits: overrides.fractionDigits ?? env[ENV_VARS.fractionDigits],
  };

  const config: CalculatorConfig = { ...DEFAULT_CONFIG };
  const checks: ValidationResult[] = [];

  const logLevel = raw.logLevel?.trim().toLowerCase();
  if (logLevel) {
    const check = validate(logLevel, [oneOf<string>(ENV_VARS.logLevel, LOG_LEVELS)]);
    checks.push(check);
    const level = LOG_LEVELS.find((candidate) => candidate === logLevel);
    if (level) {
      config.logLevel = level;
    }
  }

  if (typeof raw.jsonLogs === 'boolean') {
    config.jsonLogs = raw.jsonLogs;
  } else if (raw.jsonLogs !== undefined && raw.jsonLogs.trim() !== '') {
    const flag = raw.jsonLogs.trim().toLowerCase();
    checks.push(validate(flag, [oneOf(ENV_VARS.jsonLogs, [...TRUE_VALUES, ...FALSE_VALUES])]));
    config.jsonLogs = TRUE_VALUES.includes(flag);
  }

  const digits = raw.fractionDigits?.trim();
  if (digits) {
    const format = validate(digits, [
      matchesPattern(ENV_VARS.fractionDigits, /^\d+$/, `${ENV_VARS.fractionDigits} must be a whole number`),
    ]);
    checks.push(format);
    if (format.valid) {
      const value = Number(digits);
      checks.push(validate(value, [
        isInteger(ENV_VARS.fractionDigits),
        inRange(ENV_VARS.fractionDigits, 0, MAX_FRACTION_DIGITS),
      ]));
      config.fractionDigits = value;
    }
  }

  const result = combineResults(...checks);
  if (!result.valid) {
    throw new ConfigurationError(
      `Invalid configuration: ${result.errors.join('; ')}`,
      { errors: result.errors },
      'Fix or unset the listed TAPCALC_* variables or flags'
    );
  }

  return config;
}

/**
 * Package logger reconfigured for the given settings.
 */
export function createConfiguredLogger(config: CalculatorConfig, component?: string): Logger {
  return rootLogger.child({
    level: config.logLevel,
    json: config.jsonLogs,
    component,
  });
}
