/**
 * @file logger.ts
 * @description Simple leveled logging utility
 */

/**
 * @type LogLevel
 * @description Supported log levels, most severe first
 */
export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

/**
 * @function isLogLevel
 * @description Narrows an arbitrary string to a LogLevel
 */
export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * @class Logger
 * @description Provides logging functionality with different levels
 */
export class Logger {
  private static readonly LABELS = {
    ERROR: "ERROR",
    WARN: "WARN",
    INFO: "INFO",
    DEBUG: "DEBUG",
  };

  private static threshold: LogLevel = Logger.initialLevel();

  private static initialLevel(): LogLevel {
    const fromEnv = (process.env.LOG_LEVEL || "info").toLowerCase();
    return isLogLevel(fromEnv) ? fromEnv : "info";
  }

  /**
   * @method setLevel
   * @description Change the minimum level that gets written
   */
  public static setLevel(level: LogLevel): void {
    this.threshold = level;
  }

  public static getLevel(): LogLevel {
    return this.threshold;
  }

  private static enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.threshold);
  }

  /**
   * @method error
   * @description Log error messages
   */
  public static error(message: string, ...args: unknown[]): void {
    if (!this.enabled("error")) return;
    console.error(`[${this.LABELS.ERROR}] ${message}`, ...args);
  }

  /**
   * @method warn
   * @description Log warning messages
   */
  public static warn(message: string, ...args: unknown[]): void {
    if (!this.enabled("warn")) return;
    console.warn(`[${this.LABELS.WARN}] ${message}`, ...args);
  }

  /**
   * @method info
   * @description Log info messages
   */
  public static info(message: string, ...args: unknown[]): void {
    if (!this.enabled("info")) return;
    console.info(`[${this.LABELS.INFO}] ${message}`, ...args);
  }

  /**
   * @method debug
   * @description Log debug messages
   */
  public static debug(message: string, ...args: unknown[]): void {
    if (!this.enabled("debug")) return;
    console.debug(`[${this.LABELS.DEBUG}] ${message}`, ...args);
  }
}
