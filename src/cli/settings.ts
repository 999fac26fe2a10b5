import { readEnum, readInt, readOptionalString } from "../config/env.js";
import type { ConnectivityPolicy } from "../graph/algorithms/connectivity.js";
import type { SelfLoopPolicy } from "../graph/store.js";
import { LOG_LEVELS, type LogLevel } from "../logger.js";

/** Session-wide settings resolved once when the shell starts. */
export interface SessionSettings {
  readonly connectivity: ConnectivityPolicy;
  readonly selfLoops: SelfLoopPolicy;
  /** Decimals used when rendering weights and distances. */
  readonly precision: number;
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
}

export const DEFAULT_SETTINGS: SessionSettings = {
  connectivity: "weak",
  selfLoops: "reject",
  precision: 2,
  logLevel: "warn",
  logFile: null,
};

/**
 * Reads `GRAPH_CONNECTIVITY`, `GRAPH_SELF_LOOPS`, `GRAPH_PRECISION`,
 * `GRAPH_LOG_LEVEL` and `GRAPH_LOG_FILE`. Invalid values fall back to the
 * defaults.
 */
export function resolveSessionSettings(
  env: Readonly<Record<string, string | undefined>> = process.env,
): SessionSettings {
  return {
    connectivity: readEnum("GRAPH_CONNECTIVITY", ["weak", "strong"] as const, DEFAULT_SETTINGS.connectivity, env),
    selfLoops: readEnum("GRAPH_SELF_LOOPS", ["reject", "allow"] as const, DEFAULT_SETTINGS.selfLoops, env),
    precision: readInt("GRAPH_PRECISION", DEFAULT_SETTINGS.precision, { min: 0, max: 10 }, env),
    logLevel: readEnum("GRAPH_LOG_LEVEL", LOG_LEVELS, DEFAULT_SETTINGS.logLevel, env),
    logFile: readOptionalString("GRAPH_LOG_FILE", env) ?? null,
  };
}
