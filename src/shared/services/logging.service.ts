/**
 * Logging Service
 *
 * Structured logging for the renderer. Entries go to stderr, or to the
 * connected MCP client as notifications/message once a server is attached.
 */

import { ErrorSeverity } from '../errors/error-codes.js';

/**
 * Log level type matching the MCP logging capability (RFC 5424)
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

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: Record<string, unknown>;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warning(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  critical(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * MCP Notification sender interface
 */
export interface McpNotificationSender {
  sendLoggingMessage(params: {
    level: LogLevel;
    logger?: string;
    data: Record<string, unknown>;
  }): Promise<void>;
}

// Log level hierarchy matching RFC 5424 severity levels
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

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export class LoggingService implements Logger {
  private minLevel: LogLevel;
  private logEntries: LogEntry[] = [];
  private readonly maxEntries: number;
  private mcpServer: McpNotificationSender | null = null;
  private readonly loggerName: string;

  constructor(minLevel: LogLevel = 'info', maxEntries = 500, loggerName = 'md-reply-renderer') {
    this.minLevel = minLevel;
    this.maxEntries = maxEntries;
    this.loggerName = loggerName;
  }

  setMcpServer(server: McpNotificationSender | null): void {
    this.mcpServer = server;
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

  warning(message: string, context?: Record<string, unknown>): void {
    this.log('warning', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  critical(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('critical', message, context, error);
  }

  /**
   * Recent entries, newest last, optionally filtered by minimum level
   */
  getRecentLogs(count = 100, minLevel?: LogLevel): LogEntry[] {
    const logs = minLevel
      ? this.logEntries.filter((entry) => LOG_LEVELS[entry.level] >= LOG_LEVELS[minLevel])
      : this.logEntries;
    return logs.slice(-count);
  }

  clearLogs(): void {
    this.logEntries = [];
  }

  static severityToLogLevel(severity: ErrorSeverity): LogLevel {
    switch (severity) {
      case ErrorSeverity.DEBUG:
        return 'debug';
      case ErrorSeverity.INFO:
        return 'info';
      case ErrorSeverity.WARNING:
        return 'warning';
      case ErrorSeverity.ERROR:
        return 'error';
      case ErrorSeverity.CRITICAL:
        return 'critical';
    }
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.minLevel]) {
      return;
    }

    const entry: LogEntry = { level, message, timestamp: Date.now(), context, error };

    this.logEntries.push(entry);
    if (this.logEntries.length > this.maxEntries) {
      this.logEntries.shift();
    }

    if (this.mcpServer) {
      void this.sendMcpNotification(this.mcpServer, entry);
    } else {
      this.outputToConsole(entry);
    }
  }

  private async sendMcpNotification(
    server: McpNotificationSender,
    entry: LogEntry
  ): Promise<void> {
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
      await server.sendLoggingMessage({ level: entry.level, logger: this.loggerName, data });
    } catch (error) {
      // Not this.log: a failing transport would recurse
      console.error('[LoggingService] Failed to send MCP notification:', error);
      this.outputToConsole(entry);
    }
  }

  private outputToConsole(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    let output = `[${timestamp}] ${entry.level.toUpperCase().padEnd(8)} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += `\n  Context: ${JSON.stringify(entry.context)}`;
    }
    if (entry.error) {
      output += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        output += `\n  Stack: ${entry.error.stack}`;
      }
    }

    // stdout carries the MCP protocol
    console.error(output);
  }
}

let globalLogger: LoggingService | null = null;

/**
 * Get or create global logger instance
 */
export function getLogger(): LoggingService {
  const envLevel = process.env.LOG_LEVEL;
  globalLogger ??= new LoggingService(isLogLevel(envLevel) ? envLevel : 'info');
  return globalLogger;
}

/**
 * Normalize a caught value for the `error` parameter of the logger.
 */
export function asError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
