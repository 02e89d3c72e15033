import type { LogEntry, LogTransport } from "../types.js";

/**
 * Options for JsonTransport.
 */
export interface JsonTransportOptions {
  /** Custom output function (default: console.error, keeping stdout for the wizard) */
  output?: (line: string) => void;
}

/**
 * JSON transport for structured log output.
 * Outputs single-line JSON objects for each log entry.
 *
 * @example
 * ```typescript
 * const lines: string[] = [];
 * const transport = new JsonTransport({ output: (line) => lines.push(line) });
 * // {"time":"2026-01-05T10:00:00.000Z","level":"info","message":"Hello"}
 * ```
 */
export class JsonTransport implements LogTransport {
  private readonly output: (line: string) => void;

  constructor(options: JsonTransportOptions = {}) {
    this.output = options.output ?? console.error;
  }

  log(entry: LogEntry): void {
    const obj: Record<string, unknown> = {
      time: entry.timestamp.toISOString(),
      level: entry.level,
    };

    if (entry.context && Object.keys(entry.context).length > 0) {
      obj.context = entry.context;
    }

    obj.message = entry.message;

    if (entry.data !== undefined) {
      obj.data = entry.data;
    }

    this.output(JSON.stringify(obj));
  }
}
