/**
 * Operator logging. Everything goes to stderr; stdout belongs to the MCP transport.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export type LogSink = (line: string) => void;

export interface Logger {
  readonly level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

const stderrSink: LogSink = (line) => {
  console.error(line);
};

class LeveledLogger implements Logger {
  constructor(
    readonly level: LogLevel,
    private readonly sink: LogSink,
  ) {}

  error(message: string): void {
    this.write('error', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  /**
   * Check if we should log at the given level
   */
  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  private write(level: LogLevel, message: string): void {
    if (this.shouldLog(level)) {
      this.sink(`[${level.toUpperCase()}] ${message}`);
    }
  }
}

export function createLogger(level: LogLevel = 'info', sink: LogSink = stderrSink): Logger {
  return new LeveledLogger(level, sink);
}
