import { getEnv } from '../config/env.js';

// --- Types ---

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  timestamp: string;
  service: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  service?: string;
}

// --- Log level ordering ---

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// --- Redaction of credentials and applicant data ---

/** Keys whose values are never logged: model credentials and identity documents. */
const SENSITIVE_KEY = /password|passwd|secret|token|api[_-]?key|authorization|ssn|social_security|credit_card|card_number|cvv|passport|date_of_birth/i;

/** Applicant data that can appear inside a logged field value. */
const APPLICANT_DATA_PATTERNS: readonly RegExp[] = [
  /\b\d{3}-\d{2}-\d{4}\b/g, // SSN
  /\b\d{4}[- ]?\d{4}[- ]?\d{4}[- ]?\d{4}\b/g, // card number
  /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, // email
];

function redactValue(key: string, value: unknown): unknown {
  if (typeof value !== 'string') return value;
  if (SENSITIVE_KEY.test(key)) return '[REDACTED]';
  return APPLICANT_DATA_PATTERNS.reduce((text, pattern) => text.replace(pattern, '[REDACTED]'), value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isPlainObject(value)) {
      result[key] = redactObject(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item) =>
        isPlainObject(item) ? redactObject(item) : redactValue(key, item),
      );
    } else {
      result[key] = redactValue(key, value);
    }
  }
  return result;
}

/** Level from `LOG_LEVEL`, else info in production and debug elsewhere. */
function defaultLevel(): LogLevel {
  const env = getEnv();
  return env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug');
}

// --- Logger class ---

const CONSOLE_METHOD: Record<LogLevel, 'debug' | 'log' | 'warn' | 'error'> = {
  debug: 'debug',
  info: 'log',
  warn: 'warn',
  error: 'error',
};

export class Logger {
  private level: LogLevel;
  private readonly service: string;
  private readonly bindings: Record<string, unknown>;

  constructor(opts: LoggerOptions = {}, bindings: Record<string, unknown> = {}) {
    this.level = opts.level ?? defaultLevel();
    this.service = opts.service ?? 'formfiller';
    this.bindings = bindings;
  }

  get currentLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /** Logger that stamps `bindings` on every entry; level and service are inherited. */
  child(bindings: Record<string, unknown>): Logger {
    return new Logger({ level: this.level, service: this.service }, { ...this.bindings, ...bindings });
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.write('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.write('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.write('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.write('error', msg, data);
  }

  private write(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.level]) return;

    const entry: LogEntry = {
      level,
      msg,
      timestamp: new Date().toISOString(),
      service: this.service,
      ...this.bindings,
      ...(data && redactObject(data)),
    };
    console[CONSOLE_METHOD[level]](JSON.stringify(entry));
  }
}

// --- Singleton for convenience ---

let _defaultLogger: Logger | null = null;

export function getLogger(opts?: LoggerOptions): Logger {
  if (!_defaultLogger || opts) {
    _defaultLogger = new Logger(opts);
  }
  return _defaultLogger;
}
