type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger utility for structured logging. Debug output is only written in
 * verbose mode.
 */
export class Logger {
  constructor(
    private jsonMode = false,
    private verbose = false
  ) {}

  get isVerbose(): boolean {
    return this.verbose;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.verbose) return;
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();

    if (this.jsonMode) {
      const logEntry = {
        timestamp,
        level,
        message,
        ...data,
      };
      console.log(JSON.stringify(logEntry));
    } else {
      const prefix = PREFIXES[level];
      const formattedData = data ? ` ${JSON.stringify(data, null, 2)}` : '';
      console.log(`${prefix} ${message}${formattedData}`);
    }
  }
}

const PREFIXES: Record<LogLevel, string> = {
  debug: '🔍',
  info: 'ℹ️',
  warn: '⚠️',
  error: '❌',
};

