import chalk from "chalk";

/**
 * Log levels from most to least verbose
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

/**
 * Leveled logger writing to stderr, so stdout only ever carries the report
 */
class Logger {
  private level: LogLevel = "info";
  private prefix: string = "";
  private readonly parent: Logger | null;

  constructor(parent: Logger | null = null, prefix: string = "") {
    this.parent = parent;
    this.prefix = prefix;
  }

  configure(config: Partial<LoggerConfig>): void {
    if (config.level !== undefined) {
      this.level = config.level;
    }
    if (config.prefix !== undefined) {
      this.prefix = config.prefix;
    }
  }

  /**
   * Effective level; child loggers follow the root so `configure` after `child` still applies
   */
  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private format(message: string): string {
    return this.prefix ? `${this.prefix} ${message}` : message;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.error(chalk.gray(this.format(message)), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.error(this.format(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.error(chalk.yellow(this.format(message)), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(chalk.red(this.format(message)), ...args);
    }
  }

  /**
   * Create a child logger with a `[Name]` prefix
   */
  child(name: string): Logger {
    const tag = `[${name}]`;
    return new Logger(this.parent ?? this, this.prefix ? `${this.prefix} ${tag}` : tag);
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
export type { Logger };
