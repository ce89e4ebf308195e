/**
 * Levelled console logging for the CLI.
 *
 * Diagnostics are program output and go through the formatters, not here.
 * Progress and status messages go to stderr so that `--format json` output
 * on stdout stays machine-readable.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Destination for formatted log lines. Defaults to console.error.
 */
export type LogSink = (line: string) => void;

const defaultSink: LogSink = (line) => console.error(line);

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Render structured data as ` key=value` pairs appended to the message.
 */
function formatData(data?: Record<string, unknown>): string {
  if (!data) return '';
  const pairs = Object.entries(data)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  return pairs.length > 0 ? ` ${pairs.join(' ')}` : '';
}

class Logger {
  private level: LogLevel = 'info';
  private prefix = '';
  private sink: LogSink = defaultSink;

  /** Children read level and sink from the root logger. */
  constructor(private readonly parent?: Logger) {}

  setLevel(level: LogLevel): void {
    if (this.parent) {
      this.parent.setLevel(level);
      return;
    }
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  /**
   * Redirect output. Passing nothing restores console.error.
   */
  setSink(sink?: LogSink): void {
    if (this.parent) {
      this.parent.setSink(sink);
      return;
    }
    this.sink = sink ?? defaultSink;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private write(line: string): void {
    if (this.parent) {
      this.parent.write(line);
      return;
    }
    this.sink(line);
  }

  private emit(level: Exclude<LogLevel, 'silent'>, colour: (text: string) => string, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    const scope = this.prefix ? `[${this.prefix}] ` : '';
    this.write(colour(`${level.toUpperCase().padEnd(5)} ${scope}${message}${formatData(data)}`));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', chalk.gray, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', chalk.blue, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', chalk.yellow, message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.emit('error', chalk.red, message, { error: error.message });
      if (this.isEnabled('debug') && error.stack) {
        this.write(chalk.gray(error.stack));
      }
      return;
    }
    this.emit('error', chalk.red, message, error);
  }

  success(message: string): void {
    if (!this.isEnabled('info')) return;
    this.write(chalk.green(`✓ ${message}`));
  }

  fail(message: string): void {
    if (!this.isEnabled('info')) return;
    this.write(chalk.red(`✗ ${message}`));
  }

  /**
   * Create a child logger with a nested prefix.
   */
  child(prefix: string): Logger {
    const child = new Logger(this);
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

export const logger = new Logger();

export { Logger };
