/**
 * Structured Logger
 *
 * JSON lines with a minimum level, per-request context (correlation id,
 * tenant, user, patient) and child loggers that share the parent's sink.
 * Metadata keys that can carry credentials are redacted before output,
 * at any nesting depth.
 *
 * @module logging/logger
 */

import { generateRequestId } from '../utils/responses.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogMetadata {
  [key: string]: unknown;
}

export interface LogContext {
  correlationId?: string;
  tenantId?: string;
  userId?: string;
  patientId?: string;
  service?: string;
  operation?: string;
}

export interface ErrorInfo {
  name: string;
  message: string;
  code?: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  correlationId: string;
  tenantId?: string;
  userId?: string;
  patientId?: string;
  operation?: string;
  metadata?: LogMetadata;
  error?: ErrorInfo;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  fatal(message: string, error?: Error, metadata?: LogMetadata): void;
  child(context: LogContext): Logger;
}

/** Output sink for log entries. */
export type LogOutput = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Defaults to 'patient-access-engine'. */
  service?: string;
  /** Minimum level to emit. Defaults to 'info'. */
  level?: LogLevel;
  context?: LogContext;
  /** Defaults to one JSON line per entry on stdout. */
  output?: LogOutput;
  /** Clock for entry timestamps. */
  now?: () => Date;
}

// ─── Levels ──────────────────────────────────────────────────────────────────

const LEVEL_ORDER: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

export function isLogLevel(value: unknown): value is LogLevel {
  return LEVEL_ORDER.some((level) => level === value);
}

function severity(level: LogLevel): number {
  return LEVEL_ORDER.indexOf(level);
}

// ─── Redaction ───────────────────────────────────────────────────────────────

export const REDACTED = '[REDACTED]';

const SECRET_KEY_PATTERN = /password|secret|token|authorization|cookie/i;

function isPlainObject(value: unknown): value is LogMetadata {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.getPrototypeOf(value) === Object.prototype;
}

function redact(metadata: LogMetadata): LogMetadata {
  const result: LogMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (SECRET_KEY_PATTERN.test(key)) result[key] = REDACTED;
    else if (isPlainObject(value)) result[key] = redact(value);
    else result[key] = value;
  }
  return result;
}

function describeError(error: Error): ErrorInfo {
  const info: ErrorInfo = { name: error.name, message: error.message, stack: error.stack };
  if ('code' in error && typeof error.code === 'string') {
    info.code = error.code;
  }
  return info;
}

const stdoutOutput: LogOutput = (entry) => {
  process.stdout.write(`${JSON.stringify(entry)}\n`);
};

// ─── Implementation ──────────────────────────────────────────────────────────

interface Sink {
  minLevel: LogLevel;
  output: LogOutput;
  now: () => Date;
}

class JsonLogger implements Logger {
  constructor(
    private readonly sink: Sink,
    private readonly context: Required<Pick<LogContext, 'service' | 'correlationId'>> &
      LogContext,
  ) {}

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, undefined, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, undefined, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, undefined, metadata);
  }

  error(message: string, error?: Error, metadata?: LogMetadata): void {
    this.write('error', message, error, metadata);
  }

  fatal(message: string, error?: Error, metadata?: LogMetadata): void {
    this.write('fatal', message, error, metadata);
  }

  child(context: LogContext): Logger {
    const merged = { ...this.context, ...context };
    return new JsonLogger(this.sink, {
      ...merged,
      service: merged.service ?? this.context.service,
      correlationId: merged.correlationId ?? this.context.correlationId,
    });
  }

  private write(level: LogLevel, message: string, error?: Error, metadata?: LogMetadata): void {
    if (severity(level) < severity(this.sink.minLevel)) return;

    const { service, correlationId, tenantId, userId, patientId, operation } = this.context;
    const entry: LogEntry = {
      timestamp: this.sink.now().toISOString(),
      level,
      message,
      service,
      correlationId,
    };
    if (tenantId) entry.tenantId = tenantId;
    if (userId) entry.userId = userId;
    if (patientId) entry.patientId = patientId;
    if (operation) entry.operation = operation;
    if (metadata && Object.keys(metadata).length > 0) entry.metadata = redact(metadata);
    if (error) entry.error = describeError(error);

    this.sink.output(entry);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const context = options.context ?? {};
  return new JsonLogger(
    {
      minLevel: options.level ?? 'info',
      output: options.output ?? stdoutOutput,
      now: options.now ?? (() => new Date()),
    },
    {
      ...context,
      service: context.service ?? options.service ?? 'patient-access-engine',
      correlationId: context.correlationId || generateRequestId(),
    },
  );
}

/** Discards everything; the default where no logger is injected. */
export const silentLogger: Logger = createLogger({ output: () => undefined });
