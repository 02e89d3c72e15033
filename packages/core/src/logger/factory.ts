import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { JsonTransport } from "./transports/json.js";
import type { LogLevel } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions {
  /** Logger name for identification (default: none) */
  name?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** If true, output JSON lines instead of formatted text (default: false) */
  json?: boolean;
  /** Enable colored console output (auto-detected when omitted) */
  colors?: boolean;
}

/**
 * Factory function to create a Logger with a console or JSON transport.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'tern', level: 'debug' });
 *
 * // JSON lines for log collection
 * const logger = createLogger({ name: 'tern', json: true });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = new Logger({
    level: options.level ?? "info",
    context: options.name ? { logger: options.name } : undefined,
  });

  if (options.json) {
    logger.addTransport(new JsonTransport());
  } else {
    logger.addTransport(new ConsoleTransport({ colors: options.colors }));
  }

  return logger;
}
