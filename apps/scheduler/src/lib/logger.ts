/**
 * Leveled logging on top of debug. Each level gets its own namespace
 * (deferq:<area>:<level>) so DEBUG=deferq:*:notice shows lifecycle and
 * dispatch events only. Messages use {placeholder} interpolation from the
 * context object; the context is also passed along for structured sinks.
 */
import createDebug from "debug";

export type LogLevel = "debug" | "notice" | "warning" | "error";

export type LogContext = Record<string, unknown>;

export interface Logger {
  log(level: LogLevel, message: string, context?: LogContext): void;
}

const LEVELS: readonly LogLevel[] = ["debug", "notice", "warning", "error"];

export function interpolate(message: string, context: LogContext = {}): string {
  return message.replace(/\{([A-Za-z0-9_.]+)\}/g, (match, key: string) => {
    if (!(key in context)) return match;
    const value = context[key];
    if (typeof value === "string") return value;
    if (value instanceof Error) return value.message;
    return JSON.stringify(value) ?? String(value);
  });
}

export function createLogger(area: string): Logger {
  const sinks = new Map(
    LEVELS.map((level) => [level, createDebug(`deferq:${area}:${level}`)]),
  );
  return {
    log(level, message, context) {
      const sink = sinks.get(level);
      if (!sink?.enabled) return;
      if (context?.exception instanceof Error) {
        sink("%s %o", interpolate(message, context), context.exception);
        return;
      }
      sink("%s", interpolate(message, context));
    },
  };
}
