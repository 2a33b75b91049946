/**
 * Scoped console logging.
 *
 * Lines are prefixed with `[tagweave:<scope>]`. `debug` output is gated on the
 * `trace` configuration flag, read with `config.peek` so that checking it never
 * loads config files. A `trace` set in a config file applies once something
 * has called `config.load()` (or any other full read).
 *
 * @example
 * ```typescript
 * const log = createLogger("markup");
 * log.debug("entering element");   // only when TAGWEAVE_TRACE=1
 * log.warn("duplicate attribute", key);
 * ```
 */

import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /** Replaces the console (default: console.error for warn/error, console.log otherwise) */
  writer?: (level: LogLevel, line: string) => void;
  /** Force debug output on or off, ignoring the `trace` flag */
  debug?: boolean;
}

export interface Logger {
  readonly scope: string;
  /** Whether `debug` calls currently produce output. */
  readonly debugEnabled: boolean;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function consoleWriter(level: LogLevel, line: string): void {
  if (level === "warn" || level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

function formatDetail(detail: unknown): string {
  if (typeof detail === "string") return detail;
  if (detail instanceof Error) return `${detail.name}: ${detail.message}`;
  return JSON.stringify(detail) ?? String(detail);
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const writer = options.writer ?? consoleWriter;
  const prefix = `[tagweave:${scope}]`;

  const write = (level: LogLevel, message: string, details: unknown[]): void => {
    const suffix = details.length > 0 ? " " + details.map(formatDetail).join(" ") : "";
    writer(level, `${prefix} ${message}${suffix}`);
  };

  return {
    scope,
    get debugEnabled() {
      return options.debug ?? !!config.peek("trace");
    },
    debug(message, ...details) {
      if (this.debugEnabled) write("debug", message, details);
    },
    info(message, ...details) {
      write("info", message, details);
    },
    warn(message, ...details) {
      write("warn", message, details);
    },
    error(message, ...details) {
      write("error", message, details);
    },
  };
}
