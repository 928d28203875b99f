import os from "node:os";
import path from "node:path";
import { ConfigError } from "./errors";
import { isLogLevel, type LogLevel } from "./utils/logger";

export type EncryptionConfig =
  | { enabled: false }
  | { enabled: true; key: string };

export type AppConfig = Readonly<{
  dbPath: string;
  environment: string;
  isProduction: boolean;
  seedDemoData: boolean;
  encryption: EncryptionConfig;
  auditRetentionDays: number;
  apiKeys: readonly string[];
  port: number;
  logLevel: LogLevel;
}>;

export type Env = Record<string, string | undefined>;

export function defaultDbPath(home = os.homedir()): string {
  return path.join(home, ".tradex", "users.db");
}

function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

// "0"/"1" only, anything else is a typo worth failing on
function parseFlag(env: Env, name: string): boolean {
  const value = env[name] ?? "0";
  if (value !== "0" && value !== "1") {
    throw new ConfigError(`${name} must be '0' or '1', got '${value}'`);
  }
  return value === "1";
}

function parsePositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got '${raw}'`);
  }
  return n;
}

function parseList(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((k) => k.trim())
    .filter(Boolean);
}

/**
 * Builds the process-wide configuration from environment variables.
 *
 * Called once at startup; everything downstream receives the returned object
 * instead of reading `process.env`. Throws `ConfigError` before any database
 * is touched when the environment is inconsistent.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const rawPath = env.TRADEX_DB_PATH?.trim();
  const dbPath = path.resolve(rawPath ? expandHome(rawPath) : defaultDbPath());

  const environment = env.TRADEX_ENV?.trim() || "development";
  const isProduction = environment === "production";

  let encryption: EncryptionConfig = { enabled: false };
  if (parseFlag(env, "TRADEX_USE_SQLCIPHER")) {
    const key = env.TRADEX_DB_KEY ?? "";
    if (!key) {
      throw new ConfigError("TRADEX_DB_KEY is required when TRADEX_USE_SQLCIPHER=1");
    }
    encryption = { enabled: true, key };
  }

  const logLevel = env.TRADEX_LOG_LEVEL?.trim() || "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`TRADEX_LOG_LEVEL must be one of debug, info, warn, error, got '${logLevel}'`);
  }

  return Object.freeze({
    dbPath,
    environment,
    isProduction,
    seedDemoData: !isProduction,
    encryption: Object.freeze(encryption),
    auditRetentionDays: parsePositiveInt(env, "AUDIT_LOG_RETENTION_DAYS", 30),
    apiKeys: Object.freeze(parseList(env.TRADEX_API_KEYS)),
    port: parsePositiveInt(env, "PORT", 3000),
    logLevel,
  });
}
