import type { Writable } from 'node:stream';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  component?: string;
  scope?: string;
  destination?: Writable;
  minimal?: boolean;
  sink?: (record: LogRecord) => void;
}

export interface LogMeta {
  [key: string]: unknown;
}

export interface LogRecord extends LogMeta {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  scope?: string;
}

/**
 * Leveled logger. Writes to stderr by default so that stdout carries
 * nothing but calculator output.
 */
export class Logger {
  readonly level: LogLevel;
  private readonly json: boolean;
  private readonly component?: string;
  private readonly scope?: string;
  private readonly stream: Writable;
  private readonly minimal: boolean;
  private readonly sink?: (record: LogRecord) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'warn';
    this.json = Boolean(options.json);
    this.component = options.component;
    this.scope = options.scope;
    this.stream = options.destination ?? process.stderr;
    this.minimal = Boolean(options.minimal);
    this.sink = options.sink;
  }

  child(overrides: LoggerOptions): Logger {
    return new Logger({
      level: overrides.level ?? this.level,
      json: overrides.json ?? this.json,
      component: overrides.component ?? this.component,
      scope: overrides.scope ?? this.scope,
      destination: overrides.destination ?? this.stream,
      minimal: overrides.minimal ?? this.minimal,
      sink: overrides.sink ?? this.sink,
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] <= LEVEL_PRIORITY[this.level];
  }

  log(level: LogLevel, message: string, meta?: LogMeta) {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const record: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      scope: this.scope,
    };
    const hasMeta = meta !== undefined && Object.keys(meta).length > 0;
    if (hasMeta) {
      Object.assign(record, meta);
    }

    this.stream.write(this.render(record, hasMeta ? meta : undefined) + '\n');

    if (this.sink) {
      this.sink({ ...record });
    }
  }

  info(message: string, meta?: LogMeta) {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: LogMeta) {
    this.log('error', message, meta);
  }

  debug(message: string, meta?: LogMeta) {
    this.log('debug', message, meta);
  }

  private render(record: LogRecord, meta?: LogMeta): string {
    if (this.json) {
      return JSON.stringify(record);
    }

    const label = [this.component, this.scope].filter(Boolean).join(':');
    const segments: string[] = this.minimal ? [] : [record.timestamp, record.level.toUpperCase()];
    if (label) {
      segments.push(`[${label}]`);
    }
    if (!this.minimal) {
      segments.push('-');
    }
    segments.push(record.message);
    if (meta) {
      segments.push(JSON.stringify(meta));
    }
    return segments.join(' ');
  }
}

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

export function normalizeLogLevel(input?: string | null): LogLevel {
  if (!input) {
    return 'warn';
  }
  const normalized = input.toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  if (!match) {
    throw new Error(`Invalid log level: ${input}. Use error | warn | info | debug.`);
  }
  return match;
}

// Package-wide default; the engine and CLI derive children from it
export const logger = createLogger({ component: 'tapcalc' });
