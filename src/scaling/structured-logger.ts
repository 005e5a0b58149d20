/**
 * Structured Logger — JSON or human-readable log lines with levels and context
 *
 * - JSON output in production (machine-parseable for Loki/ELK)
 * - Pretty single-line output in development
 * - Component tag on every line, child loggers carry fixed context
 *
 * Level comes from LEDGER_LOG_LEVEL unless given explicitly.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.SILENT]: 'silent',
};

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  [key: string]: unknown;
}

/** Receives every entry at or above the logger's level. */
export type LogSink = (entry: LogEntry, level: LogLevel) => void;

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch ((value || '').trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

function stringifyValue(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export class StructuredLogger {
  private readonly minLevel: LogLevel;
  private readonly defaultContext: LogContext;
  private readonly useJson: boolean;
  private readonly sink?: LogSink;

  constructor(opts?: { minLevel?: LogLevel; context?: LogContext; json?: boolean; sink?: LogSink }) {
    this.minLevel = opts?.minLevel ?? parseLogLevel(process.env.LEDGER_LOG_LEVEL) ?? LogLevel.INFO;
    this.defaultContext = opts?.context ?? {};
    // Default to JSON in production, pretty in development
    this.useJson = opts?.json ?? process.env.NODE_ENV === 'production';
    this.sink = opts?.sink;
  }

  child(context: LogContext): StructuredLogger {
    return new StructuredLogger({
      minLevel: this.minLevel,
      context: { ...this.defaultContext, ...context },
      json: this.useJson,
      sink: this.sink,
    });
  }

  debug(component: string, message: string, data?: LogContext): void {
    this.log(LogLevel.DEBUG, component, message, data);
  }

  info(component: string, message: string, data?: LogContext): void {
    this.log(LogLevel.INFO, component, message, data);
  }

  warn(component: string, message: string, data?: LogContext): void {
    this.log(LogLevel.WARN, component, message, data);
  }

  error(component: string, message: string, data?: LogContext): void {
    this.log(LogLevel.ERROR, component, message, data);
  }

  private log(level: LogLevel, component: string, message: string, data?: LogContext): void {
    if (level < this.minLevel || level === LogLevel.SILENT) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      component,
      message,
      ...this.defaultContext,
      ...data,
    };

    if (this.sink) {
      this.sink(entry, level);
      return;
    }

    if (this.useJson) {
      const output = JSON.stringify(entry, stringifyValue);
      if (level >= LogLevel.ERROR) {
        process.stderr.write(output + '\n');
      } else {
        process.stdout.write(output + '\n');
      }
      return;
    }

    const ts = entry.timestamp.substring(11, 23); // HH:MM:SS.mmm
    const lvl = LEVEL_NAMES[level].toUpperCase().padEnd(5);
    const extra = data ? ' ' + JSON.stringify(data, stringifyValue) : '';
    const line = `${ts} ${lvl} [${component}] ${message}${extra}`;
    if (level >= LogLevel.ERROR) {
      console.error(line);
    } else if (level >= LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

// Process-wide default logger
export const logger = new StructuredLogger();
