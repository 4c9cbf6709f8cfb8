import dotenv from "dotenv";
import { ConfigError } from "./errors.js";
import { DEFAULT_REF_ID } from "./constants/game.js";
dotenv.config();

export type Range = readonly [number, number];

export interface BotConfig {
  apiId: number | null;
  apiHash: string | null;
  sessionsPath: string;
  dbPath: string;
  proxiesPath: string;
  /** Seconds; each runner waits a random time in [1, sessionStartDelay] before starting. */
  sessionStartDelay: number;
  /** Seconds between actions, also the bounds of the retry backoff. */
  actionDelay: Range;
  requestRetries: number;
  requestTimeoutMs: number;
  /** Seconds between farming cycles. */
  sleepTime: Range;
  refId: string;
  sessionsPerProxy: number;
  useProxy: boolean;
  disableProxyReplace: boolean;
  debugLogging: boolean;
  logFormat: "pretty" | "json";
  blacklistedSessions: readonly string[];
  dashboardPort: number;
}

type Env = Record<string, string | undefined>;

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, key: string, fallback: number, min = 0): number {
  const raw = read(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`expected an integer >= ${min}, got "${raw}"`, key);
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = read(env, key);
  if (raw === undefined) return fallback;
  switch (raw.toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw new ConfigError(`expected a boolean, got "${raw}"`, key);
  }
}

/** Accepts "2,5", "2-5" or "[2, 5]". */
function readRange(env: Env, key: string, fallback: Range): Range {
  const raw = read(env, key);
  if (raw === undefined) return fallback;
  const parts = raw.replace(/[[\]()\s]/g, "").split(/[,-]/).filter(Boolean).map(Number);
  if (parts.length !== 2 || parts.some((n) => !Number.isFinite(n) || n < 0) || parts[0] > parts[1]) {
    throw new ConfigError(`expected "min,max" with 0 <= min <= max, got "${raw}"`, key);
  }
  return [parts[0], parts[1]];
}

export function loadConfig(env: Env = process.env): BotConfig {
  const apiIdRaw = read(env, "API_ID");
  const apiId = apiIdRaw === undefined ? null : readInt(env, "API_ID", 0, 1);
  const logFormat = read(env, "LOG_FORMAT") ?? "pretty";
  if (logFormat !== "pretty" && logFormat !== "json") {
    throw new ConfigError(`expected "pretty" or "json", got "${logFormat}"`, "LOG_FORMAT");
  }

  const config: BotConfig = {
    apiId,
    apiHash: read(env, "API_HASH") ?? null,
    sessionsPath: read(env, "SESSIONS_PATH") ?? "sessions",
    dbPath: read(env, "DB_PATH") ?? "data/sessions.db",
    proxiesPath: read(env, "PROXIES_PATH") ?? "proxies.txt",
    sessionStartDelay: readInt(env, "SESSION_START_DELAY", 360),
    actionDelay: readRange(env, "ACTION_DELAY", [2, 5]),
    requestRetries: readInt(env, "REQUEST_RETRIES", 3, 1),
    requestTimeoutMs: readInt(env, "REQUEST_TIMEOUT", 60, 1) * 1000,
    sleepTime: readRange(env, "SLEEP_TIME", [600, 3600]),
    refId: read(env, "REF_ID") ?? DEFAULT_REF_ID,
    sessionsPerProxy: readInt(env, "SESSIONS_PER_PROXY", 1, 1),
    useProxy: readBool(env, "USE_PROXY", true),
    disableProxyReplace: readBool(env, "DISABLE_PROXY_REPLACE", false),
    debugLogging: readBool(env, "DEBUG_LOGGING", false),
    logFormat,
    blacklistedSessions: Object.freeze(
      (read(env, "BLACKLISTED_SESSIONS") ?? "").split(",").map((s) => s.trim()).filter(Boolean)
    ),
    dashboardPort: readInt(env, "DASHBOARD_PORT", 0),
  };

  return Object.freeze(config);
}

/** Telegram credentials are only needed to actually run sessions. */
export function requireTelegramCredentials(config: BotConfig): { apiId: number; apiHash: string } {
  if (config.apiId === null || config.apiHash === null) {
    throw new ConfigError("API_ID and API_HASH must be set in .env to run sessions");
  }
  return { apiId: config.apiId, apiHash: config.apiHash };
}
