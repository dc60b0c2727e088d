export { NoLogger, noLogger } from './no-logger';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface Logger {
  /**
   * General informational messages.
   */
  info(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  createNested(prefix: string): Logger;
}

export class ConsoleLogger implements Logger {
  constructor(
    private prefix?: string,
    private _console: Console = console,
  ) {}

  info(message: string, data?: unknown) {
    this.write('info', message, data);
  }

  error(message: string, data?: unknown) {
    this.write('error', message, data);
  }

  warn(message: string, data?: unknown) {
    this.write('warn', message, data);
  }

  debug(message: string, data?: unknown) {
    this.write('debug', message, data);
  }

  createNested(prefix: string): ConsoleLogger {
    const combinedPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return new ConsoleLogger(combinedPrefix, this._console);
  }

  private write(level: LogLevel, message: string, data: unknown) {
    if (this.prefix) {
      message = `[${this.prefix}] ${message}`;
    }
    if (data !== undefined) {
      this._console[level](message, data);
    } else {
      this._console[level](message);
    }
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  data?: unknown;
}

/**
 * Collects log entries in memory. Nested loggers append to the parent's entries.
 */
export class TestLogger implements Logger {
  constructor(
    private name: string = 'TestLogger',
    private logs: LogEntry[] = [],
  ) {}

  info(message: string, data?: unknown) {
    this.logs.push({ level: 'info', message, data });
  }

  warn(message: string, data?: unknown) {
    this.logs.push({ level: 'warn', message, data });
  }

  debug(message: string, data?: unknown) {
    this.logs.push({ level: 'debug', message, data });
  }

  error(message: string, data?: unknown) {
    this.logs.push({ level: 'error', message, data });
  }

  getLogs(): LogEntry[] {
    return this.logs;
  }

  clear() {
    this.logs.length = 0;
  }

  print() {
    const logs = this.logs.map((log) => {
      const data = log.data !== undefined ? ' ' + JSON.stringify(log.data) : '';
      return `[${log.level.toUpperCase()}] [${this.name}] ${log.message}${data}`;
    });
    console.log(logs.join('\n'));
  }

  createNested(prefix: string): TestLogger {
    const nestedPrefix = this.name ? `${this.name}:${prefix}` : prefix;
    return new TestLogger(nestedPrefix, this.logs);
  }
}

export const defaultLogger = new ConsoleLogger('PathResolver');
