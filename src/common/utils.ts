/**
 * Shared utility functions for logging, error handling, and helper operations
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

type LogContext = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

/**
 * Structured logging with JSON output
 * Written to stderr so task results on stdout stay clean
 */
export function log(level: LogLevel, message: string, context?: LogContext): void {
  const threshold = parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  if (context !== undefined) {
    entry.context = context;
  }

  console.error(JSON.stringify(entry));
}

export function logDebug(message: string, context?: LogContext): void {
  log(LogLevel.DEBUG, message, context);
}

export function logInfo(message: string, context?: LogContext): void {
  log(LogLevel.INFO, message, context);
}

export function logWarn(message: string, context?: LogContext): void {
  log(LogLevel.WARN, message, context);
}

export function logError(message: string, context?: LogContext): void {
  log(LogLevel.ERROR, message, context);
}

/**
 * Base error for everything a task run can report
 * `exitCode` is what the process exits with when this error ends the run
 */
export class TaskError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1,
    public readonly details?: LogContext,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'TaskError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Settings file unreadable or malformed
 */
export class ConfigurationError extends TaskError {
  constructor(message: string, details?: LogContext) {
    super(message, 1, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A required task input was absent and no default was applied
 */
export class MissingInputError extends TaskError {
  constructor(
    public readonly task: string,
    public readonly input: string
  ) {
    super(`Missing required input "${input}" for task ${task}`, 1, { task, input });
    this.name = 'MissingInputError';
  }
}

/**
 * A referenced local file does not exist
 */
export class ResourceNotFoundError extends TaskError {
  constructor(public readonly path: string) {
    super(`Image file not found: ${path}`, 1, { path });
    this.name = 'ResourceNotFoundError';
  }
}

/**
 * The remote model call failed (transport, auth, throttling or model-side)
 */
export class InvocationError extends TaskError {
  /** `cause` is the SDK or transport error exactly as it was thrown */
  constructor(message: string, details?: LogContext, options?: ErrorOptions) {
    super(message, 1, details, options);
    this.name = 'InvocationError';
  }
}

/**
 * Malformed base64 in an otherwise successful response. Non-fatal.
 */
export class DecodeError extends TaskError {
  constructor(message: string, details?: LogContext) {
    super(message, 0, details);
    this.name = 'DecodeError';
  }
}

/**
 * The result could not be written to disk
 */
export class OutputError extends TaskError {
  constructor(message: string, details?: LogContext) {
    super(message, 1, details);
    this.name = 'OutputError';
  }
}

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (isRecord(error) && typeof error.message === 'string') {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return JSON.stringify(error);
}

/**
 * Reads the `code` of a Node.js system error (ENOENT, EACCES, ...)
 * Checked by shape: fs errors may come from another realm, where `instanceof Error` fails
 */
export function getErrorCode(error: unknown): string | undefined {
  if (isRecord(error) && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Stack trace of an error, or `name: message` when it has none
 */
export function describeError(error: unknown): string {
  if (isRecord(error) && typeof error.stack === 'string' && error.stack.length > 0) {
    return error.stack;
  }
  const name = isRecord(error) && typeof error.name === 'string' ? error.name : typeof error;
  return `${name}: ${getErrorMessage(error)}`;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Formats a date as yyyyMMddHHmmss in local time
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');

  return (
    String(date.getFullYear()) +
    pad(date.getMonth() + 1) +
    pad(date.getDate()) +
    pad(date.getHours()) +
    pad(date.getMinutes()) +
    pad(date.getSeconds())
  );
}
