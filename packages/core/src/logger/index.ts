// Factory
export type { CreateLoggerOptions } from "./factory.js";
export { createLogger } from "./factory.js";
export { createSilentLogger, Logger } from "./logger.js";
// Transports
export {
  ConsoleTransport,
  type ConsoleTransportOptions,
  JsonTransport,
  type JsonTransportOptions,
} from "./transports/index.js";
export type { LogEntry, LoggerOptions, LogLevel, LogTransport } from "./types.js";
export { LOG_LEVEL_COLORS, LOG_LEVEL_PRIORITY } from "./types.js";
