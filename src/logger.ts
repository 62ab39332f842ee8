import { cfg } from "./config.js";

const LEVELS = { debug: 10, info: 20, warn: 30, error: 40 } as const;
type Level = keyof typeof LEVELS;

const enabled = (level: Level) => LEVELS[level] >= LEVELS[cfg.LOG_LEVEL];

/** Tiny logger wrapper for consistent tags */
export const log = {
  debug: (...a: unknown[]) => {
    if (enabled("debug")) console.debug(new Date().toISOString(), "[DEBUG]", ...a);
  },
  info: (...a: unknown[]) => {
    if (enabled("info")) console.log(new Date().toISOString(), "[INFO]", ...a);
  },
  warn: (...a: unknown[]) => {
    if (enabled("warn")) console.warn(new Date().toISOString(), "[WARN]", ...a);
  },
  error: (...a: unknown[]) => {
    if (enabled("error")) console.error(new Date().toISOString(), "[ERROR]", ...a);
  },
};

/** Flatten an unknown thrown value for structured log payloads. */
export function errMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
