export {
  CalculatorEngine,
  INITIAL_SNAPSHOT,
  type ActiveOperand,
  type CalculatorEngineOptions,
  type CalculatorPhase,
  type CalculatorSnapshot,
} from './engine.js';
export {
  DIGITS,
  KEY_ALIASES,
  describeKey,
  key,
  parseKey,
  parseKeys,
  tokenizeKeys,
  type CalculatorKey,
  type Digit,
  type KeyAlias,
  type KeyKind,
} from './keys.js';
export {
  BINARY_OPERATORS,
  applyOperator,
  isBinaryOperator,
  operatorSymbol,
  type BinaryOperator,
} from './operators.js';
export {
  DEFAULT_FRACTION_DIGITS,
  MAX_FRACTION_DIGITS,
  formatNumber,
  parseOperand,
  roundResult,
} from './number-format.js';
export { OperandBuffer } from './operand-buffer.js';
export { failedSteps, reportFailedSteps, runInput, runKeys, type SessionStep } from './session.js';
export { evaluateLine, REPL_COMMANDS, type ReplOutcome } from './repl.js';
export {
  DEFAULT_CONFIG,
  ENV_VARS,
  createConfiguredLogger,
  loadConfig,
  type CalculatorConfig,
  type RawConfig,
} from './config.js';
export {
  CalculatorError,
  ConfigurationError,
  MissingOperandError,
  NoOperationError,
  OperandParseError,
  ValidationError,
  formatErrorMessage,
  getErrorMessage,
  isErrorCode,
  wrapError,
  type ErrorCode,
} from './shared/error-handler.js';
export { Logger, createLogger, logger, normalizeLogLevel, type LogLevel, type LogRecord } from './shared/logger.js';
export { err, ok, type Result } from './shared/result.js';
