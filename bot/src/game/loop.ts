import { GameApiClient } from "../api/client.js";
import { createRetryPolicy, type RetryPolicy } from "../api/retry.js";
import { fetchGameState, longestRunningChallenge, type FetchedState } from "../api/state.js";
import type { Transport } from "../api/transport.js";
import type { BotConfig } from "../config.js";
import {
  ERROR_SLEEP_SECONDS,
  MAINTENANCE_SLEEP_SECONDS,
  MAX_ACTIONS_PER_PASS,
  NO_PROXY_SLEEP_SECONDS,
  REFUSED_MISSION_COOLDOWN_SECONDS,
  SILENT_ERROR_CODES,
} from "../constants/game.js";
import { dashboard, type DashboardEvents } from "../dashboard/events.js";
import { AuthError, GameLogicError, MaintenanceError, RetryExhaustedError, errorMessage } from "../errors.js";
import type { ProxyPool } from "../proxy/pool.js";
import type { SessionConfigRepository } from "../store/sessions.js";
import { constellationAdvance } from "../strategy/constellation.js";
import { actionKey, decide, describeAction } from "../strategy/engine.js";
import type { Authenticator } from "../telegram/webapp.js";
import type { CycleSummary, InitData, RunnerState, SessionConfig } from "../types.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { randomBetween, randomRange, type RandomSource } from "../utils/math.js";
import { delay, formatDuration, type Sleeper } from "../utils/time.js";
import { executeAction } from "./executor.js";
import { collectRewards } from "./rewards.js";
import { transition } from "./state-machine.js";

const SILENT_CODES = new Set<string>(SILENT_ERROR_CODES);

/** Per-session network plumbing; rebuilt whenever the session's proxy changes. */
export interface SessionServices {
  authenticator: Authenticator;
  transport: Transport;
}

export type ServiceFactory = (session: SessionConfig) => SessionServices;

export interface RunnerOptions {
  config: BotConfig;
  repo: SessionConfigRepository;
  services: ServiceFactory;
  pool?: ProxyPool | null;
  events?: DashboardEvents;
  logger?: Logger;
  sleep?: Sleeper;
  random?: RandomSource;
  clock?: () => number;
}

export interface RunnerOutcome {
  sessionName: string;
  cycles: number;
  reason: string;
}

type AuthResult = "ok" | "rejected" | "failed";

/**
 * Drives one account: authenticate, then cycle (rewards, a policy pass,
 * constellation bookkeeping) and sleep until shutdown or a fatal auth error.
 * Errors never leave the runner; `run` always resolves.
 */
export class SessionRunner {
  private state: RunnerState = "idle";
  private session: SessionConfig;
  private services: SessionServices;
  private initData: InitData | null = null;
  private signal: AbortSignal = new AbortController().signal;
  /** Refused mission action keys and when they may be tried again (ms). */
  private readonly refusedMissions = new Map<string, number>();

  private readonly config: BotConfig;
  private readonly repo: SessionConfigRepository;
  private readonly factory: ServiceFactory;
  private readonly pool: ProxyPool | null;
  private readonly events: DashboardEvents;
  private readonly logger: Logger;
  private readonly sleep: Sleeper;
  private readonly random: RandomSource;
  private readonly clock: () => number;
  private readonly retry: RetryPolicy;

  constructor(session: SessionConfig, options: RunnerOptions) {
    this.session = session;
    this.config = options.config;
    this.repo = options.repo;
    this.factory = options.services;
    this.pool = options.pool ?? null;
    this.events = options.events ?? dashboard;
    this.logger = options.logger ?? createLogger(session.sessionName);
    this.sleep = options.sleep ?? delay;
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? Date.now;
    this.retry = createRetryPolicy(this.config, this.random, this.sleep);
    this.services = this.factory(session);
  }

  get name(): string {
    return this.session.sessionName;
  }

  get currentState(): RunnerState {
    return this.state;
  }

  get settings(): SessionConfig {
    return this.session;
  }

  private moveTo(to: RunnerState): void {
    const from = this.state;
    this.state = transition(from, to);
    this.logger.state(`${from} → ${to}`);
    this.events.emitStateChange(this.name, from, to);
  }

  private client(): GameApiClient {
    const signer = {
      initData: (): InitData => {
        if (!this.initData) throw new AuthError("init", "not authenticated");
        return this.initData;
      },
    };
    return new GameApiClient(this.services.transport, signer, this.retry, this.logger, this.signal);
  }

  private pause(range: readonly [number, number]): Promise<void> {
    return this.sleep(randomRange(range, this.random) * 1000, this.signal);
  }

  private async rest(seconds: number, reason: string): Promise<void> {
    this.moveTo("sleeping");
    this.logger.sleep(`Sleeping ${formatDuration(seconds * 1000)} (${reason})`);
    this.events.emitSleep(this.name, seconds, reason);
    await this.sleep(seconds * 1000, this.signal);
  }

  private stop(reason: string, cycles: number): RunnerOutcome {
    if (this.state !== "stopped") this.moveTo("stopped");
    this.logger.info(`Stopped: ${reason}`);
    return { sessionName: this.name, cycles, reason };
  }

  private async authenticate(): Promise<AuthResult> {
    try {
      this.initData = await this.services.authenticator.authenticate();
    } catch (error) {
      if (error instanceof AuthError) {
        this.logger.error(`Authorization rejected: ${error.message}`);
        return "rejected";
      }
      this.logger.error(`Couldn't get init data: ${errorMessage(error)}`);
      return "failed";
    }
    if (this.state !== "authenticated") this.moveTo("authenticated");
    this.logger.success("Authorized");
    return "ok";
  }

  /** Bind the session to a proxy from the pool. False only on shutdown. */
  private async ensureProxy(): Promise<boolean> {
    const pool = this.pool;
    if (!this.config.useProxy || !pool || pool.size === 0) return true;

    while (!this.signal.aborted) {
      const current = this.session.proxy;
      const proxy = this.config.disableProxyReplace
        ? await pool.acquireUnchecked(this.name, current)
        : await pool.acquire(this.name, current);
      if (proxy) {
        if (proxy !== current) {
          this.session = await this.repo.update(this.name, { proxy });
          this.services = this.factory(this.session);
        }
        this.logger.proxy(`Using proxy ${proxy}`);
        return true;
      }
      this.logger.warn(`No working proxy available, waiting ${NO_PROXY_SLEEP_SECONDS}s`);
      await this.sleep(NO_PROXY_SLEEP_SECONDS * 1000, this.signal);
    }
    return false;
  }

  /** Swap a proxy that exhausted its retries. True when a new one is in place. */
  private async replaceProxy(): Promise<boolean> {
    const failed = this.session.proxy;
    if (!this.config.useProxy || this.config.disableProxyReplace || !this.pool || !failed) return false;

    const proxy = await this.pool.replace(this.name, failed);
    if (!proxy) {
      this.logger.warn("No working proxy left to replace the failed one");
      return false;
    }
    this.session = await this.repo.update(this.name, { proxy });
    this.services = this.factory(this.session);
    this.logger.proxy(`Replaced proxy ${failed} with ${proxy}`);
    return true;
  }

  /** One farming cycle. Throws on anything other than a refused action. */
  async runCycle(): Promise<CycleSummary> {
    if (this.state !== "cycling") this.moveTo("cycling");

    // Settings may have been edited while sleeping; the proxy stays as bound
    const stored = await this.repo.load(this.name);
    if (stored) this.session = { ...stored, proxy: this.session.proxy };

    const client = this.client();
    const first = await fetchGameState(client, this.session, this.clock);
    const claimed = await collectRewards(client, first.state, this.logger);

    const skip = new Set<string>();
    const now = this.clock();
    for (const [key, retryAt] of this.refusedMissions) {
      if (retryAt > now) skip.add(key);
      else this.refusedMissions.delete(key);
    }
    let executed = 0;
    let failed = 0;
    let lastAction = "none";
    let current: FetchedState = first;
    let fresh: FetchedState | null = claimed === 0 ? first : null;

    for (let i = 0; i < MAX_ACTIONS_PER_PASS && !this.signal.aborted; i++) {
      current = fresh ?? (await fetchGameState(client, this.session, this.clock));
      fresh = null;
      this.events.emitResources(this.name, current.state.resources, current.startIndex);

      const decision = decide(current.state, this.session, { skip });
      const label = describeAction(decision.action);
      this.events.emitDecision(this.name, decision.action.kind, label, decision.reason);
      if (decision.action.kind === "noop") {
        this.logger.debug(`Pass finished: ${decision.reason}`);
        break;
      }
      this.logger.info(`Decision: ${label} - ${decision.reason}`);

      try {
        const detail = await executeAction(decision.action, {
          client,
          logger: this.logger,
          pause: () => this.pause(this.config.actionDelay),
        });
        executed++;
        lastAction = label;
        this.events.emitActionResult(this.name, label, true, detail);
      } catch (error) {
        if (!(error instanceof GameLogicError)) throw error;
        failed++;
        skip.add(actionKey(decision.action));
        if (decision.action.kind === "claim_mission") {
          this.refusedMissions.set(actionKey(decision.action), this.clock() + REFUSED_MISSION_COOLDOWN_SECONDS * 1000);
        }
        if (SILENT_CODES.has(error.code)) {
          this.logger.debug(`${label} refused: ${error.code}`);
        } else {
          this.logger.warn(`${label} refused: ${error.code}`);
        }
        this.events.emitActionResult(this.name, label, false, error.code);
      }

      if (i === MAX_ACTIONS_PER_PASS - 1) {
        this.logger.warn(`Action cap of ${MAX_ACTIONS_PER_PASS} reached, ending pass`);
      }
      await this.pause(this.config.actionDelay);
    }

    const advance = constellationAdvance(this.session, current.state.constellations, current.startIndex);
    if (advance) {
      this.session = await this.repo.update(this.name, advance);
      this.logger.farm(`Constellation ${current.startIndex} complete, moving on to ${current.startIndex + 1}`);
    }

    const longest = longestRunningChallenge(current.state);
    const summary: CycleSummary = {
      sessionName: this.name,
      executed,
      failed,
      lastAction,
      constellationIndex: current.startIndex,
      sleepSeconds: longest > 0 ? longest : randomRange(this.config.sleepTime, this.random),
    };
    this.logger.info(`Cycle done: ${executed} action(s), ${failed} refused`);
    this.events.emitCycleSummary(summary);
    return summary;
  }

  /** Run until the signal aborts or the session can't authenticate. */
  async run(signal: AbortSignal): Promise<RunnerOutcome> {
    this.signal = signal;
    let cycles = 0;

    if (this.config.sessionStartDelay > 0) {
      const seconds = randomBetween(1, this.config.sessionStartDelay, this.random);
      this.logger.info(`Starting in ${formatDuration(seconds * 1000)}`);
      await this.sleep(seconds * 1000, signal);
    }

    try {
      if (!(await this.ensureProxy())) return this.stop("shutdown", cycles);

      while (!this.initData) {
        if (signal.aborted) return this.stop("shutdown", cycles);
        const result = await this.authenticate();
        if (result === "rejected") return this.stop("authorization rejected", cycles);
        if (result === "failed") await this.sleep(randomRange(ERROR_SLEEP_SECONDS, this.random) * 1000, signal);
      }

      let authRetried = false;
      let proxyReplaced = false;

      while (!signal.aborted) {
        let sleepSeconds: number;
        let reason: string;

        try {
          const summary = await this.runCycle();
          cycles++;
          authRetried = false;
          proxyReplaced = false;
          sleepSeconds = summary.sleepSeconds;
          reason = "cycle finished";
        } catch (error) {
          if (signal.aborted) break;

          if (error instanceof AuthError) {
            if (authRetried) return this.stop(`authorization rejected again: ${error.message}`, cycles);
            authRetried = true;
            this.logger.warn(`Authorization expired (${error.message}), re-authorizing`);
            const result = await this.authenticate();
            if (result === "rejected") return this.stop("authorization rejected", cycles);
            if (result === "ok") continue;
            sleepSeconds = randomRange(ERROR_SLEEP_SECONDS, this.random);
            reason = "re-authorization failed";
          } else if (error instanceof MaintenanceError) {
            this.logger.warn("Game server is in maintenance");
            sleepSeconds = randomRange(MAINTENANCE_SLEEP_SECONDS, this.random);
            reason = "maintenance";
          } else if (error instanceof RetryExhaustedError) {
            this.logger.error(`Session unhealthy: ${error.message}`);
            if (!proxyReplaced && (await this.replaceProxy())) {
              proxyReplaced = true;
              continue;
            }
            sleepSeconds = randomRange(ERROR_SLEEP_SECONDS, this.random);
            reason = "network failure";
          } else {
            this.logger.error(`Cycle failed: ${errorMessage(error)}`);
            sleepSeconds = randomRange(ERROR_SLEEP_SECONDS, this.random);
            reason = "error";
          }
        }

        if (signal.aborted) break;
        await this.rest(sleepSeconds, reason);
      }
    } catch (error) {
      // Store or proxy-pool failures outside a cycle
      return this.stop(`fatal: ${errorMessage(error)}`, cycles);
    }

    return this.stop("shutdown", cycles);
  }
}
