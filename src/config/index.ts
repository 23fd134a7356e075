import { version } from "../../package.json";

export const IS_DEV = process.env.NODE_ENV !== "production";

export const LOG_LEVEL = process.env.LOG_LEVEL ?? (IS_DEV ? "debug" : "info");

export interface EngineConfig {
  path: string;
  initTimeoutMs: number;
  quitTimeoutMs: number;
}

export const ENGINE_CONFIG: EngineConfig = {
  path: process.env.STOCKFISH_PATH ?? "/usr/games/stockfish",
  initTimeoutMs: 10_000,
  quitTimeoutMs: 2_000,
};

export const ANALYSIS_DEFAULTS = {
  depth: 12,
  lineCount: 2,
  timeBudgetSeconds: 0.05,
} as const;

// Fixed resource bounds, not request parameters.
export const ANALYSIS_LIMITS = {
  maxLineCount: 3,
  keyMomentCount: 5,
  mateSentinelCp: 100_000,
} as const;

export function getCurrentVersion(): string {
  return version;
}
