/**
 * Logging Service
 *
 * Structured logging with RFC 5424 levels. Entries go to stderr, or to the
 * tool server as `notifications/message` once a sender is attached.
 */

/**
 * Log level type (RFC 5424 severities)
 */
export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical'
  | 'alert'
  | 'emergency';

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  notice(message: string, context?: Record<string, unknown>): void;
  warning(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  critical(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * Receives log entries as protocol notifications
 */
export interface LogNotificationSender {
  sendLoggingMessage(params: {
    level: LogLevel;
    logger?: string;
    data: Record<string, unknown>;
  }): Promise<void>;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  notice: 2,
  warning: 3,
  error: 4,
  critical: 5,
  alert: 6,
  emergency: 7,
};

/**
 * Narrow an arbitrary string (env var, protocol request) to a LogLevel.
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Logging Service
 *
 * Keeps a bounded ring of recent entries for diagnostics.
 */
export class LoggingService implements Logger {
  private minLevel: LogLevel;
  private logEntries: LogEntry[] = [];
  private readonly maxEntries: number;
  private sender: LogNotificationSender | null = null;
  private readonly loggerName: string;

  constructor(minLevel: LogLevel = 'info', maxEntries = 1000, loggerName = 'semantic-web-env') {
    this.minLevel = minLevel;
    this.maxEntries = maxEntries;
    this.loggerName = loggerName;
  }

  setNotificationSender(sender: LogNotificationSender | null): void {
    this.sender = sender;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  getLoggerName(): string {
    return this.loggerName;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  /**
   * Normal but significant condition
   */
  notice(message: string, context?: Record<string, unknown>): void {
    this.log('notice', message, context);
  }

  warning(message: string, context?: Record<string, unknown>): void {
    this.log('warning', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  critical(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('critical', message, context, error);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      context,
      error,
    };

    this.logEntries.push(entry);
    if (this.logEntries.length > this.maxEntries) {
      this.logEntries.shift();
    }

    if (this.sender) {
      void this.sendNotification(this.sender, entry);
    } else {
      this.outputToConsole(entry);
    }
  }

  private async sendNotification(sender: LogNotificationSender, entry: LogEntry): Promise<void> {
    const data: Record<string, unknown> = {
      message: entry.message,
      timestamp: new Date(entry.timestamp).toISOString(),
    };

    if (entry.context && Object.keys(entry.context).length > 0) {
      data.context = entry.context;
    }

    if (entry.error) {
      data.error = {
        message: entry.error.message,
        name: entry.error.name,
        stack: entry.error.stack,
      };
    }

    try {
      await sender.sendLoggingMessage({
        level: entry.level,
        logger: this.loggerName,
        data,
      });
    } catch (error) {
      // Not this.log(): a failing sender would recurse
      console.error('[LoggingService] Failed to send log notification:', error);
      this.outputToConsole(entry);
    }
  }

  /**
   * Write to stderr; stdout carries the tool protocol.
   */
  private outputToConsole(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(9);

    let output = `[${timestamp}] ${levelStr} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += `\n  Context: ${JSON.stringify(entry.context)}`;
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        output += `\n  Stack: ${entry.error.stack}`;
      }
    }

    console.error(output);
  }

  /**
   * Most recent entries, optionally filtered by minimum level.
   */
  getRecentLogs(count = 100, minLevel?: LogLevel): LogEntry[] {
    let logs = this.logEntries;

    if (minLevel) {
      const threshold = LOG_LEVELS[minLevel];
      logs = logs.filter((entry) => LOG_LEVELS[entry.level] >= threshold);
    }

    return logs.slice(-count);
  }

  clearLogs(): void {
    this.logEntries = [];
  }
}

let globalLogger: LoggingService | null = null;

/**
 * Get or create the global logger. LOG_LEVEL sets the initial minimum level.
 */
export function getLogger(): LoggingService {
  const envLevel = process.env.LOG_LEVEL;
  globalLogger ??= new LoggingService(isLogLevel(envLevel) ? envLevel : 'info');
  return globalLogger;
}
