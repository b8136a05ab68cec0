/* eslint-disable no-console */
import { env } from "./env";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const threshold: LogLevel = env.LOG_LEVEL;

function enabled(level: Exclude<LogLevel, "silent">) {
  return RANK[level] >= RANK[threshold];
}

/**
 * Console logging gated by LOG_LEVEL. Each line is tagged with the
 * component scope so chain/classifier traces stay readable.
 */
export function createLogger(scope: string) {
  const tag = `[${scope}]`;
  return {
    debug: (...args: unknown[]) => {
      if (enabled("debug")) console.debug(tag, ...args);
    },
    info: (...args: unknown[]) => {
      if (enabled("info")) console.info(tag, ...args);
    },
    warn: (...args: unknown[]) => {
      if (enabled("warn")) console.warn(tag, ...args);
    },
    error: (...args: unknown[]) => {
      if (enabled("error")) console.error(tag, ...args);
    }
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
