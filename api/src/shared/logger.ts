import type { InvocationContext } from "@azure/functions";
import type { LogLevel } from "./env";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** The part of InvocationContext the host forwards to Application Insights. */
export type LogSink = Pick<InvocationContext, "debug" | "log" | "warn" | "error">;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Built once per worker process from settings, then bound to each
 * invocation's context so log lines keep their invocation id.
 */
export class LoggerFactory {
  constructor(private readonly level: LogLevel = "info") {}

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  forContext(context: LogSink): Logger {
    const write =
      (level: LogLevel, sink: (...args: unknown[]) => void) =>
      (message: string, ...args: unknown[]) => {
        if (this.isEnabled(level)) sink(message, ...args);
      };

    return {
      debug: write("debug", (...args) => context.debug(...args)),
      info: write("info", (...args) => context.log(...args)),
      warn: write("warn", (...args) => context.warn(...args)),
      error: write("error", (...args) => context.error(...args)),
    };
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "Unknown error";
}
