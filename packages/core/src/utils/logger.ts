/**
 * Log level type
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: string;
  data?: Record<string, unknown>;
  /** Rendered with the success colour */
  success?: boolean;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Context prefix for all logs */
  context?: string;
  /** Enable timestamps */
  timestamps?: boolean;
  /** Enable colored output */
  colors?: boolean;
  /** Custom log handler */
  handler?: (entry: LogEntry) => void;
}

/**
 * Log level priority
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * ANSI color codes
 */
const COLORS = {
  reset: '\x1b[0m',
  debug: '\x1b[36m', // cyan
  info: '\x1b[34m', // blue
  success: '\x1b[32m', // green
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
  context: '\x1b[90m', // gray
};

/**
 * Level of every logger created without an explicit one
 */
let defaultLevel: LogLevel = 'info';

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Normalize the detail argument of a log call into structured data
 */
function toLogData(detail: unknown): Record<string, unknown> | undefined {
  if (detail === undefined) {
    return undefined;
  }
  if (detail instanceof Error) {
    return { name: detail.name, message: detail.message, stack: detail.stack };
  }
  if (typeof detail === 'object' && detail !== null && !Array.isArray(detail)) {
    return Object.fromEntries(Object.entries(detail));
  }
  return { detail };
}

/**
 * Structured logger for the agent runtime
 */
export class Logger {
  private level?: LogLevel;
  private context?: string;
  private timestamps: boolean;
  private colors: boolean;
  private handler?: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level;
    this.context = options.context;
    this.timestamps = options.timestamps ?? true;
    this.colors = options.colors ?? true;
    this.handler = options.handler;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: string): Logger {
    const childContext = this.context ? `${this.context}:${context}` : context;
    return new Logger({
      level: this.level,
      context: childContext,
      timestamps: this.timestamps,
      colors: this.colors,
      handler: this.handler,
    });
  }

  debug(message: string, detail?: unknown): void {
    this.log('debug', message, detail);
  }

  info(message: string, detail?: unknown): void {
    this.log('info', message, detail);
  }

  /**
   * Info-level message for a completed operation
   */
  success(message: string, detail?: unknown): void {
    this.log('info', message, detail, true);
  }

  warn(message: string, detail?: unknown): void {
    this.log('warn', message, detail);
  }

  /**
   * Log an error message. Error objects are expanded into name, message and stack.
   */
  error(message: string, detail?: unknown): void {
    this.log('error', message, detail);
  }

  private log(level: LogLevel, message: string, detail: unknown, success = false): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.getLevel()]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: this.context,
      data: toLogData(detail),
      success,
    };

    if (this.handler) {
      this.handler(entry);
    } else {
      this.defaultHandler(entry);
    }
  }

  /**
   * Default console output handler
   */
  private defaultHandler(entry: LogEntry): void {
    const parts: string[] = [];

    if (this.timestamps) {
      const ts = entry.timestamp.toISOString();
      parts.push(this.colors ? `${COLORS.context}${ts}${COLORS.reset}` : ts);
    }

    const levelStr = (entry.success ? 'OK' : entry.level.toUpperCase()).padEnd(5);
    if (this.colors) {
      const color = entry.success ? COLORS.success : COLORS[entry.level];
      parts.push(`${color}${levelStr}${COLORS.reset}`);
    } else {
      parts.push(levelStr);
    }

    if (entry.context) {
      const ctx = `[${entry.context}]`;
      parts.push(this.colors ? `${COLORS.context}${ctx}${COLORS.reset}` : ctx);
    }

    parts.push(entry.message);

    if (entry.data && Object.keys(entry.data).length > 0) {
      parts.push(JSON.stringify(entry.data));
    }

    const output = parts.join(' ');

    // stdout carries chat output only
    switch (entry.level) {
      case 'debug':
      case 'info':
      case 'warn':
        // eslint-disable-next-line no-console
        console.warn(output);
        break;
      case 'error':
        // eslint-disable-next-line no-console
        console.error(output);
        break;
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Explicit level, or the process-wide default when none was set
   */
  getLevel(): LogLevel {
    return this.level ?? defaultLevel;
  }
}

/**
 * Create a JSON logger for structured logging
 */
export function createJsonLogger(options: Omit<LoggerOptions, 'handler'> = {}): Logger {
  return new Logger({
    ...options,
    colors: false,
    handler: (entry) => {
      // eslint-disable-next-line no-console
      console.error(
        JSON.stringify({
          timestamp: entry.timestamp.toISOString(),
          level: entry.level,
          context: entry.context,
          message: entry.message,
          ...entry.data,
        })
      );
    },
  });
}

export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

/**
 * Create a logger for a module context
 */
export function createLogger(context: string, options: Omit<LoggerOptions, 'context'> = {}): Logger {
  return new Logger({ ...options, context });
}
