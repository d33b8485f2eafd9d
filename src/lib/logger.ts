import chalk from "chalk";

/**
 * Log levels from most to least verbose
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  /** Prepend an ISO timestamp to every line (long-running server mode) */
  timestamps?: boolean;
}

/**
 * Console logger with colored output and per-component prefixes.
 *
 * Children share the parent's settings: configuring the root logger after a
 * child was created still changes what the child prints.
 */
class Logger {
  private settings: { level: LogLevel; timestamps: boolean };
  private readonly prefix: string;

  constructor(prefix = "", settings?: { level: LogLevel; timestamps: boolean }) {
    this.prefix = prefix;
    this.settings = settings ?? { level: "info", timestamps: false };
  }

  configure(config: Partial<LoggerConfig>): void {
    if (config.level !== undefined) {
      this.settings.level = config.level;
    }
    if (config.timestamps !== undefined) {
      this.settings.timestamps = config.timestamps;
    }
  }

  get level(): LogLevel {
    return this.settings.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.settings.level];
  }

  private format(message: string): string {
    const line = this.prefix ? `${this.prefix} ${message}` : message;
    return this.settings.timestamps ? `${new Date().toISOString()} ${line}` : line;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.debug(chalk.gray(this.format(message)), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.info(this.format(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(chalk.yellow(this.format(message)), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(chalk.red(this.format(message)), ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.info(chalk.green(this.format(message)), ...args);
    }
  }

  /**
   * Create a child logger with a prefix, e.g. `logger.child("[scout]")`
   */
  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix} ${prefix}` : prefix, this.settings);
  }
}

export type { Logger };

/**
 * Global logger instance
 */
export const logger = new Logger();
