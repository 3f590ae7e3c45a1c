/**
 * @arch depsum.infra.logging
 *
 * Leveled console logging.
 */
import chalk from 'chalk';

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

/** Where debug and info lines go. Warnings and errors always use stderr. */
export type LogOutput = 'stdout' | 'stderr';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Console logger for the depsum CLI.
 * Children share their parent's level and output until they set their own.
 */
class Logger {
  private level: LogLevel | undefined;
  private output: LogOutput | undefined;
  private prefix: string;

  constructor(private readonly parent?: Logger, prefix = '') {
    this.prefix = prefix;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? 'info';
  }

  setOutput(output: LogOutput): void {
    this.output = output;
  }

  getOutput(): LogOutput {
    return this.output ?? this.parent?.getOutput() ?? 'stdout';
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private write(line: string): void {
    if (this.getOutput() === 'stderr') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  private format(tag: string, message: string): string {
    return this.prefix ? `[${tag}] [${this.prefix}] ${message}` : `[${tag}] ${message}`;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.write(chalk.gray(this.format('DEBUG', message)));
    if (data) {
      this.write(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.write(chalk.blue(this.format('INFO', message)));
    if (data) {
      this.write(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    console.warn(chalk.yellow(this.format('WARN', message)));
    if (data) {
      console.warn(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(this.format('ERROR', message)));
    if (error instanceof Error) {
      console.error(chalk.red(error.message));
      if (this.shouldLog('debug') && error.stack) {
        console.error(chalk.gray(error.stack));
      }
    } else if (error) {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  /**
   * Create a child logger with a prefix.
   */
  child(prefix: string): Logger {
    return new Logger(this, this.prefix ? `${this.prefix}:${prefix}` : prefix);
  }
}

export const logger = new Logger();

export { Logger };
