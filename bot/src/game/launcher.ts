import { readdir } from "fs/promises";
import { join } from "path";
import { AxiosTransport } from "../api/transport.js";
import { randomUserAgent } from "../api/user-agent.js";
import { requireTelegramCredentials, type BotConfig } from "../config.js";
import { dashboard, type DashboardEvents } from "../dashboard/events.js";
import { startDashboard } from "../dashboard/server.js";
import { ConfigError, errorMessage } from "../errors.js";
import { checkProxy } from "../proxy/check.js";
import { ProxyPool, readProxiesFile } from "../proxy/pool.js";
import { openDatabase } from "../store/db.js";
import { SqliteSessionStore, loadOrCreateSession, type SessionConfigRepository } from "../store/sessions.js";
import { TelegramWebAppAuth } from "../telegram/webapp.js";
import type { SessionConfig } from "../types.js";
import { log } from "../utils/logger.js";
import { SessionRunner, type RunnerOutcome, type RunnerOptions, type ServiceFactory } from "./loop.js";

const SESSION_EXT = ".session";

/** Session names found in the sessions directory, minus blacklisted ones. */
export async function discoverSessions(sessionsPath: string, blacklist: readonly string[]): Promise<string[]> {
  let files: string[];
  try {
    files = await readdir(sessionsPath);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
    throw error;
  }
  const blocked = new Set(blacklist);
  return files
    .filter((f) => f.endsWith(SESSION_EXT))
    .map((f) => f.slice(0, -SESSION_EXT.length))
    .filter((name) => {
      if (!blocked.has(name)) return true;
      log.info(`Session ${name} is blacklisted, skipping`);
      return false;
    })
    .sort();
}

export function createServiceFactory(config: BotConfig): ServiceFactory {
  const { apiId, apiHash } = requireTelegramCredentials(config);
  return (session) => {
    const proxy = config.useProxy ? session.proxy : null;
    return {
      authenticator: new TelegramWebAppAuth({
        apiId,
        apiHash,
        sessionFile: join(config.sessionsPath, `${session.sessionName}${SESSION_EXT}`),
        proxy,
        refId: config.refId,
      }),
      transport: new AxiosTransport({ userAgent: session.userAgent, proxy, timeoutMs: config.requestTimeoutMs }),
    };
  };
}

export interface LaunchOptions extends Omit<RunnerOptions, "logger"> {
  signal: AbortSignal;
  userAgent?: () => string;
}

/**
 * Load or create settings for every session, reserve their stored proxies,
 * then run all of them concurrently until the signal aborts. One runner's
 * failure never stops the others.
 */
export async function runSessions(names: string[], options: LaunchOptions): Promise<RunnerOutcome[]> {
  const { repo, pool, signal } = options;
  const userAgent = options.userAgent ?? (() => randomUserAgent());

  const sessions: SessionConfig[] = [];
  const refused: RunnerOutcome[] = [];
  for (const name of names) {
    try {
      sessions.push(await loadOrCreateSession(repo, name, userAgent));
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      log.error(`Session ${name} refused to start: ${error.message}`);
      refused.push({ sessionName: name, cycles: 0, reason: `invalid settings: ${error.message}` });
    }
  }
  if (pool) {
    for (const session of sessions) {
      if (session.proxy) pool.bind(session.sessionName, session.proxy);
    }
  }

  const runners = sessions.map((session) => new SessionRunner(session, options));
  const results = await Promise.allSettled(runners.map((runner) => runner.run(signal)));

  const outcomes = results.map((result, i): RunnerOutcome => {
    if (result.status === "fulfilled") return result.value;
    const sessionName = runners[i].name;
    log.error(`Runner ${sessionName} crashed: ${errorMessage(result.reason)}`);
    return { sessionName, cycles: 0, reason: errorMessage(result.reason) };
  });
  return [...refused, ...outcomes];
}

/** Wire the real store, proxy pool, Telegram and HTTP clients, then run until SIGINT/SIGTERM. */
export async function runBot(config: BotConfig, events: DashboardEvents = dashboard): Promise<void> {
  const services = createServiceFactory(config);
  const names = await discoverSessions(config.sessionsPath, config.blacklistedSessions);
  if (names.length === 0) {
    log.warn(`No ${SESSION_EXT} files found in ${config.sessionsPath}`);
    return;
  }
  log.info(`Detected ${names.length} session(s): ${names.join(", ")}`);

  let pool: ProxyPool | null = null;
  if (config.useProxy) {
    const proxies = await readProxiesFile(config.proxiesPath);
    log.proxy(`Loaded ${proxies.length} proxies, ${config.sessionsPerProxy} session(s) per proxy`);
    pool = new ProxyPool(proxies, config.sessionsPerProxy, checkProxy);
  }

  const controller = new AbortController();
  const shutdown = (sig: string) => {
    if (controller.signal.aborted) return;
    log.info(`${sig} received, stopping sessions...`);
    controller.abort();
  };
  const onInt = () => shutdown("SIGINT");
  const onTerm = () => shutdown("SIGTERM");
  process.on("SIGINT", onInt);
  process.on("SIGTERM", onTerm);

  const { db, close } = openDatabase(config.dbPath);
  const repo: SessionConfigRepository = new SqliteSessionStore(db);
  const server = config.dashboardPort > 0 ? await startDashboard(config.dashboardPort, events) : null;

  try {
    const outcomes = await runSessions(names, { config, repo, services, pool, events, signal: controller.signal });
    for (const outcome of outcomes) {
      log.info(`${outcome.sessionName}: ${outcome.cycles} cycle(s), ${outcome.reason}`);
    }
  } finally {
    process.off("SIGINT", onInt);
    process.off("SIGTERM", onTerm);
    await server?.close();
    close();
  }
}
