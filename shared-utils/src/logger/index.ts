/**
 * Logger contract shared by every service, plus the default console
 * implementation used outside of tests.
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const severity: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function toLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value?.toLowerCase()) ?? "info";
}

export class ConsoleLogger implements Logger {
  constructor(
    private serviceName: string,
    private level: LogLevel = "info"
  ) {}

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled("debug")) {
      console.debug(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled("info")) {
      console.log(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled("warn")) {
      console.warn(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled("error")) {
      console.error(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  /**
   * Derive a logger for a sub-component, e.g. `insights:pricing`
   */
  child(component: string): ConsoleLogger {
    return new ConsoleLogger(`${this.serviceName}:${component}`, this.level);
  }

  private enabled(level: LogLevel): boolean {
    return severity[level] >= severity[this.level];
  }
}

/**
 * Logger that drops everything; handy for unit tests
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createLogger(serviceName: string, level?: string): ConsoleLogger {
  return new ConsoleLogger(serviceName, toLogLevel(level));
}
