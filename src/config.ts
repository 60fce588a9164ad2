/**
 * Process configuration, read from the environment (and .env).
 */

import "dotenv/config";
import { isLogLevel, type LogLevel } from "./logger.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface AppConfig {
  readonly logLevel: LogLevel;
  /** Worker-pool size for parallel build phases, 0 = unbounded */
  readonly concurrency: number;
}

type Env = Record<string, string | undefined>;

function optionalEnv(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value !== undefined && value !== "" ? value : defaultValue;
}

/**
 * Parse a concurrency setting. Accepts non-negative integers only.
 */
export function parseConcurrency(value: string, source: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new ConfigError(
      `${source} must be a non-negative integer, got: ${value}`
    );
  }
  return parsed;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const logLevel = optionalEnv(env, "LOG_LEVEL", "info");
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${logLevel}. Must be debug, info, warn, or error.`
    );
  }

  return {
    logLevel,
    concurrency: parseConcurrency(
      optionalEnv(env, "INKWELL_CONCURRENCY", "0"),
      "INKWELL_CONCURRENCY"
    ),
  };
}
