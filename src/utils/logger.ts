import { env } from "../config/env";

type Level = "debug" | "info" | "warn" | "error";

const weights: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const enabled = (level: Level) => weights[level] >= weights[env.LOG_LEVEL];

const debug = (...args: unknown[]) => {
  if (enabled("debug")) console.debug("[DEBUG]", ...args);
};
const info = (...args: unknown[]) => {
  if (enabled("info")) console.info("[INFO]", ...args);
};
const warn = (...args: unknown[]) => {
  if (enabled("warn")) console.warn("[WARN]", ...args);
};
const error = (...args: unknown[]) => {
  if (enabled("error")) console.error("[ERROR]", ...args);
};

export default { debug, info, warn, error };
