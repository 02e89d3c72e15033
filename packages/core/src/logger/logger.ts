import type { LogEntry, LoggerOptions, LogLevel, LogTransport } from "./types.js";
import { LOG_LEVEL_PRIORITY } from "./types.js";

/**
 * Logger with multi-transport support, level filtering, and child logger creation.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: 'info' });
 * logger.addTransport(consoleTransport);
 * logger.info('Setup started', { interactive: true });
 *
 * const childLogger = logger.child({ component: 'credentials' });
 * childLogger.debug('Looking up key'); // inherits transports and level
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly transports: LogTransport[];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.context = options.context ?? {};
    this.transports = options.transports ?? [];
  }

  /**
   * Log a trace message (lowest severity).
   */
  trace(message: string, data?: unknown): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }

  /**
   * Log a fatal message (highest severity).
   */
  fatal(message: string, data?: unknown): void {
    this.log("fatal", message, data);
  }

  /**
   * Add a transport for log output.
   */
  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Create a child logger with merged context.
   * Child inherits transports and level from parent.
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      context: { ...this.context, ...context },
      transports: this.transports,
    });
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.level]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      data,
    };

    for (const transport of this.transports) {
      transport.log(entry);
    }
  }
}

/**
 * Logger that drops every entry; the default for library consumers that
 * do not pass one in.
 */
export function createSilentLogger(): Logger {
  return new Logger({ level: "fatal" });
}
