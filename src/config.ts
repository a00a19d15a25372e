import { existsSync, readFileSync } from "node:fs";
import { parse } from "dotenv";
import { ConfigError } from "./errors";

export type Env = Record<string, string | undefined>;

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LogLevels: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

export interface DatabaseConfig {
  readonly host: string;
  readonly port: number;
  readonly database: string;
  readonly user: string;
  readonly password: string;
}

export interface ReadinessConfig {
  readonly attempts: number;
  readonly intervalMs: number;
}

export interface SuperuserConfig {
  readonly username?: string;
  readonly email?: string;
  readonly password?: string;
}

export interface AuctionsConfig {
  readonly project: string;
  readonly envFile: string;
  readonly image: string;
  readonly appPort: number;
  readonly databaseHostPort: number;
  readonly cacheHostPort: number;
  readonly database: DatabaseConfig;
  readonly redisUrl: string;
  readonly readiness: ReadinessConfig;
  readonly logLevel: LogLevel;
  readonly superuser: SuperuserConfig;
}

/**
 * Reads KEY=value pairs from an env file. A missing file yields no entries.
 */
export function readEnvFile(path: string): Record<string, string> {
  if (!existsSync(path)) {
    return {};
  }
  return parse(readFileSync(path));
}

function integer(env: Env, key: string, fallback: number, min = 1): number {
  const raw = env[key];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function port(env: Env, key: string, fallback: number): number {
  const value = integer(env, key, fallback);
  if (value > 65535) {
    throw new ConfigError(`${key} must be a valid port, got "${value}"`);
  }
  return value;
}

function text(env: Env, key: string, fallback: string): string {
  const raw = env[key];
  return raw === undefined || raw === "" ? fallback : raw;
}

function logLevel(env: Env): LogLevel {
  const raw = text(env, "LOG_LEVEL", "info");
  const level = LogLevels.find((candidate) => candidate === raw);
  if (!level) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LogLevels.join(", ")}`);
  }
  return level;
}

/**
 * Builds the runtime configuration once, from the env file named by
 * AUCTIONS_ENV_FILE (default `.env`) overlaid by the given environment.
 */
export function loadConfig(env: Env = process.env): AuctionsConfig {
  const envFile = text(env, "AUCTIONS_ENV_FILE", ".env");
  const merged: Env = { ...readEnvFile(envFile), ...env };

  return Object.freeze({
    project: text(merged, "AUCTIONS_PROJECT", "auctions"),
    envFile,
    image: text(merged, "AUCTIONS_IMAGE", "auctions:latest"),
    appPort: port(merged, "APP_PORT", 8001),
    databaseHostPort: port(merged, "DATABASE_HOST_PORT", 5433),
    cacheHostPort: port(merged, "CACHE_HOST_PORT", 6380),
    database: {
      host: text(merged, "POSTGRES_HOST", "auctions_postgres"),
      port: port(merged, "POSTGRES_PORT", 5432),
      database: text(
        merged,
        "POSTGRES_DB",
        text(merged, "POSTGRES_NAME", "auctions"),
      ),
      user: text(merged, "POSTGRES_USER", "postgres"),
      password: text(merged, "POSTGRES_PASSWORD", ""),
    },
    redisUrl: text(
      merged,
      "AUCTIONS_SERVICE_REDIS_LOCATION",
      "redis://auctions_redis:6379/0",
    ),
    readiness: {
      attempts: integer(merged, "WAIT_FOR_DB_ATTEMPTS", 30),
      intervalMs: integer(merged, "WAIT_FOR_DB_INTERVAL_MS", 1000, 0),
    },
    logLevel: logLevel(merged),
    superuser: {
      username: merged.AUCTIONS_SUPERUSER_USERNAME,
      email: merged.AUCTIONS_SUPERUSER_EMAIL,
      password: merged.AUCTIONS_SUPERUSER_PASSWORD,
    },
  });
}
