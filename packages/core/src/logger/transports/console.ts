import type { LogEntry, LogTransport } from "../types.js";
import { LOG_LEVEL_COLORS } from "../types.js";

const RESET = "\x1b[0m";

/**
 * Options for ConsoleTransport.
 */
export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
  /** Custom writer (default: stderr for warn and above, stdout otherwise) */
  output?: (line: string, entry: LogEntry) => void;
}

/**
 * Detect if colors should be enabled by default.
 * Disables colors when:
 * - stdout is not a TTY
 * - CI environment variable is set
 * - NO_COLOR environment variable is set
 */
function shouldEnableColors(): boolean {
  // Check NO_COLOR (standard: https://no-color.org/)
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }

  if (process.env.CI) {
    return false;
  }

  return process.stdout.isTTY === true;
}

/**
 * Format a timestamp as ISO string without milliseconds.
 */
function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

function defaultOutput(line: string, entry: LogEntry): void {
  if (entry.level === "warn" || entry.level === "error" || entry.level === "fatal") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Console transport with color support.
 *
 * @example
 * ```typescript
 * const transport = new ConsoleTransport({ colors: true });
 * logger.addTransport(transport);
 * ```
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;
  private readonly output: (line: string, entry: LogEntry) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.useColors = options.colors ?? shouldEnableColors();
    this.output = options.output ?? defaultOutput;
  }

  /**
   * Log an entry to the console with optional coloring.
   */
  log(entry: LogEntry): void {
    const timestamp = formatTimestamp(entry.timestamp);
    const level = entry.level.toUpperCase().padEnd(5);

    let output = this.useColors
      ? `[${timestamp}] ${LOG_LEVEL_COLORS[entry.level]}[${level}]${RESET} ${entry.message}`
      : `[${timestamp}] [${level}] ${entry.message}`;

    if (entry.data !== undefined) {
      const dataStr = typeof entry.data === "string" ? entry.data : JSON.stringify(entry.data);
      output += ` ${dataStr}`;
    }

    this.output(output, entry);
  }
}
