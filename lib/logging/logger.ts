/**
 * Structured Logger
 *
 * JSON lines through the console with:
 * - Correlation ID per analysis, carried by child loggers into every evaluator
 * - Masking of secret-looking fields before anything is written
 * - Level filtering from LOG_LEVEL
 */

import { nanoid } from 'nanoid';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.FATAL]: 'fatal',
};

/**
 * Context bound to a logger and repeated on every entry it writes
 */
export interface LogContext {
  /** Unique ID of one analysis run */
  correlationId?: string;
  /** Message-ID of the email under analysis */
  messageId?: string;
  /** Evaluator that produced the entry */
  evaluator?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  service: string;
  correlationId?: string;
  messageId?: string;
  evaluator?: string;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  duration?: number;
  [key: string]: unknown;
}

const SENSITIVE_PATTERNS = [
  /password/i,
  /token/i,
  /secret/i,
  /apikey/i,
  /api_key/i,
  /authorization/i,
  /cookie/i,
  /credential/i,
];

function isSensitiveField(fieldName: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(fieldName));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function maskValue(data: unknown, depth: number): unknown {
  if (depth > 10) return '[MAX_DEPTH]';

  if (typeof data === 'string') {
    if (/^eyJ[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+$/.test(data)) {
      return '[JWT_REDACTED]';
    }
    if (/^[a-zA-Z0-9_-]{32,}$/.test(data)) {
      return '[API_KEY_REDACTED]';
    }
    return data;
  }

  if (Array.isArray(data)) {
    return data.map((item) => maskValue(item, depth + 1));
  }

  if (data instanceof Date) {
    return data.toISOString();
  }

  if (isRecord(data)) {
    return maskRecord(data, depth + 1);
  }

  return data;
}

function maskRecord(data: Record<string, unknown>, depth = 0): Record<string, unknown> {
  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    masked[key] = isSensitiveField(key) ? '[REDACTED]' : maskValue(value, depth);
  }
  return masked;
}

function formatError(error: Error): { name: string; message: string; stack?: string } {
  return {
    name: error.name,
    message: error.message,
    stack: process.env.NODE_ENV !== 'production' ? error.stack : undefined,
  };
}

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'fatal':
      return LogLevel.FATAL;
    default:
      return process.env.NODE_ENV === 'production' ? LogLevel.INFO : LogLevel.DEBUG;
  }
}

/**
 * Logger with context binding
 */
export class Logger {
  private readonly context: LogContext;
  private readonly service: string;
  private minLevel: LogLevel;

  constructor(service: string, context: LogContext = {}, minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL)) {
    this.service = service;
    this.context = context;
    this.minLevel = minLevel;
  }

  child(additionalContext: LogContext): Logger {
    return new Logger(this.service, { ...this.context, ...additionalContext }, this.minLevel);
  }

  withCorrelationId(correlationId: string): Logger {
    return this.child({ correlationId });
  }

  withEvaluator(evaluator: string): Logger {
    return this.child({ evaluator });
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const { correlationId, messageId, evaluator, ...rest } = this.context;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LOG_LEVEL_NAMES[level],
      message,
      service: this.service,
      ...(correlationId ? { correlationId } : {}),
      ...(messageId ? { messageId } : {}),
      ...(evaluator ? { evaluator } : {}),
      ...maskRecord(rest),
      ...(meta ? maskRecord(meta) : {}),
    };

    const json = JSON.stringify(entry);

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(json);
        break;
      case LogLevel.INFO:
        console.info(json);
        break;
      case LogLevel.WARN:
        console.warn(json);
        break;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        console.error(json);
        break;
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, errorOrMeta?: unknown, meta?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, mergeErrorMeta(errorOrMeta, meta));
  }

  fatal(message: string, errorOrMeta?: unknown, meta?: Record<string, unknown>): void {
    this.write(LogLevel.FATAL, message, mergeErrorMeta(errorOrMeta, meta));
  }

  /**
   * Time an async operation; failures are logged and rethrown
   */
  async time<T>(operation: string, fn: () => Promise<T>, meta?: Record<string, unknown>): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      this.debug(`${operation} completed`, { ...meta, duration: Date.now() - start, success: true });
      return result;
    } catch (error) {
      this.error(`${operation} failed`, error, { ...meta, duration: Date.now() - start, success: false });
      throw error;
    }
  }
}

function mergeErrorMeta(errorOrMeta: unknown, meta?: Record<string, unknown>): Record<string, unknown> {
  const finalMeta: Record<string, unknown> = { ...meta };
  if (errorOrMeta instanceof Error) {
    finalMeta.error = formatError(errorOrMeta);
  } else if (isRecord(errorOrMeta)) {
    Object.assign(finalMeta, errorOrMeta);
  } else if (errorOrMeta !== undefined) {
    finalMeta.error = { name: 'NonError', message: String(errorOrMeta) };
  }
  return finalMeta;
}

export function generateCorrelationId(): string {
  return `cid_${nanoid(21)}`;
}

export function createLogger(service: string, context?: LogContext): Logger {
  return new Logger(service, context);
}

/**
 * Service loggers
 */
export const loggers = {
  analyzer: createLogger('analyzer'),
  evaluator: createLogger('evaluator'),
  threatIntel: createLogger('threat-intel'),
  history: createLogger('sender-history'),
  resilience: createLogger('resilience'),
};

