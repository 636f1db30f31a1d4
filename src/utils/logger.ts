/**
 * Structured logger. Each entry is written to stdout as one JSON line with a
 * `severity` field so Cloud Logging picks up the level.
 */

export interface LogContext {
  [key: string]: string | number | boolean | null | undefined;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const MAX_BUFFERED_ENTRIES = 500;

class Logger {
  private logs: LogEntry[] = [];
  private minLevel: LogLevel = 'info';

  debug(message: string, context: LogContext = {}): void {
    this.log('debug', message, context);
  }

  info(message: string, context: LogContext = {}): void {
    this.log('info', message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.log('warn', message, context);
  }

  error(message: string, context: LogContext = {}): void {
    this.log('error', message, context);
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private log(level: LogLevel, message: string, context: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      context,
      timestamp: new Date().toISOString(),
    };

    const line = JSON.stringify({ severity: level.toUpperCase(), ...entry });
    if (level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }

    this.logs.push(entry);
    if (this.logs.length > MAX_BUFFERED_ENTRIES) {
      this.logs.shift();
    }
  }

  // For testing purposes
  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  getLogsByMessage(message: string): LogEntry[] {
    return this.logs.filter((entry) => entry.message === message);
  }

  clearLogs(): void {
    this.logs = [];
  }
}

export const logger = new Logger();
