import type { LogLevel } from "./logger";
import { isLogLevel } from "./logger";

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  /** null runs on the in-memory stores */
  databaseUrl: string | null;
  /** Empty allows any origin */
  allowedOrigins: string[];
  commandTimeoutMs: number;
  rosterSeedPath: string | null;
  wsPath: string;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (raw === null) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function getConfig(env: Env = process.env): ServerConfig {
  const logLevel = readString(env, "LOG_LEVEL") ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
  }

  return {
    port: readPositiveInt(env, "PORT", 4000),
    host: readString(env, "HOST") ?? "0.0.0.0",
    logLevel,
    databaseUrl: readString(env, "DATABASE_URL"),
    allowedOrigins: (readString(env, "ALLOWED_ORIGINS") ?? "")
      .split(",")
      .map((origin) => origin.trim())
      .filter(Boolean),
    commandTimeoutMs: readPositiveInt(env, "COMMAND_TIMEOUT_MS", 10_000),
    rosterSeedPath: readString(env, "ROSTER_SEED_PATH"),
    wsPath: readString(env, "WS_PATH") ?? "/ws",
  };
}
