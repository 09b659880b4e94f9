/**
 * Structured Logger for the Admission Gate
 *
 * JSON-lines logging with timestamp, level, service, component and optional
 * context, written to stderr. Debug output is skipped in production;
 * LOG_LEVEL raises the threshold further.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContextValue = string | number | boolean | null | undefined | string[];

export interface LogContext {
  ruleId?: string;
  ruleSetVersion?: string;
  path?: string;
  [key: string]: LogContextValue;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  component?: string;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  durationMs?: number;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function shouldLog(level: LogLevel): boolean {
  if (level === 'debug' && process.env.NODE_ENV === 'production') {
    return false;
  }
  const threshold = process.env.LOG_LEVEL?.toLowerCase();
  if (threshold === 'silent') {
    return false;
  }
  if (isLogLevel(threshold)) {
    return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
  }
  return true;
}

function write(entry: LogEntry): void {
  if (!shouldLog(entry.level)) {
    return;
  }
  const line = JSON.stringify(entry);
  // stdout carries command output (reports); every level goes to stderr
  if (entry.level === 'error') {
    console.error(line);
  } else if (entry.level === 'warn') {
    console.warn(line);
  } else {
    process.stderr.write(`${line}\n`);
  }
}

function toErrorField(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'UnknownError', message: String(error) };
}

export class Logger {
  constructor(
    private readonly serviceName: string = 'admission-gate',
    private readonly component?: string
  ) {}

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  /**
   * Log errors with full stack trace
   */
  error(message: string, error?: unknown, context?: LogContext): void {
    write({
      timestamp: new Date().toISOString(),
      level: 'error',
      service: this.serviceName,
      component: this.component,
      message,
      context,
      error: error === undefined ? undefined : toErrorField(error),
    });
  }

  /**
   * Log with execution timing
   */
  timed(message: string, durationMs: number, context?: LogContext, level: LogLevel = 'info'): void {
    write({
      timestamp: new Date().toISOString(),
      level,
      service: this.serviceName,
      component: this.component,
      message,
      context,
      durationMs,
    });
  }

  /**
   * Create a child logger with a component name
   */
  withComponent(component: string): Logger {
    return new Logger(this.serviceName, component);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    write({
      timestamp: new Date().toISOString(),
      level,
      service: this.serviceName,
      component: this.component,
      message,
      context,
    });
  }
}

export const logger = new Logger();
