import { readFile } from "fs/promises";
import { shuffle, type RandomSource } from "../utils/math.js";
import { log } from "../utils/logger.js";
import { normalizeProxy } from "./agent.js";
import type { ProxyChecker } from "./check.js";

export async function readProxiesFile(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      log.warn(`Proxy file ${path} not found, continuing without proxies`);
      return [];
    }
    throw error;
  }
  const proxies = text
    .replace(/^\uFEFF/, "")
    .split(/\r?\n/)
    .map(normalizeProxy)
    .filter((p): p is string => p !== null);
  return [...new Set(proxies)];
}

/**
 * Shared proxy pool. Sessions are bound to proxies at startup, at most
 * `sessionsPerProxy` per proxy. Assignment changes run one at a time so two
 * sessions never grab the last free slot together.
 */
export class ProxyPool {
  private readonly assignments = new Map<string, string>();
  private lock: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly proxies: readonly string[],
    private readonly sessionsPerProxy: number,
    private readonly check: ProxyChecker,
    private readonly random: RandomSource = Math.random
  ) {}

  get size(): number {
    return this.proxies.length;
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.lock.then(fn, fn);
    this.lock = run.catch(() => undefined);
    return run;
  }

  proxyOf(sessionName: string): string | null {
    return this.assignments.get(sessionName) ?? null;
  }

  usage(proxy: string): number {
    let count = 0;
    for (const assigned of this.assignments.values()) {
      if (assigned === proxy) count++;
    }
    return count;
  }

  /** Whether one more session may use `proxy` under the per-proxy limit. */
  private hasRoom(proxy: string): boolean {
    return this.usage(proxy) < this.sessionsPerProxy;
  }

  unused(exclude: ReadonlySet<string> = new Set()): string[] {
    return this.proxies.filter((p) => !exclude.has(p) && this.hasRoom(p));
  }

  /** Record an existing binding without checking it. */
  bind(sessionName: string, proxy: string): void {
    this.assignments.set(sessionName, proxy);
  }

  release(sessionName: string): void {
    this.assignments.delete(sessionName);
  }

  /**
   * Keep `current` if it still works and other sessions leave room on it,
   * otherwise bind the session to a working unused proxy. Returns null when
   * none is left.
   */
  acquire(sessionName: string, current: string | null): Promise<string | null> {
    return this.exclusive(async () => {
      this.release(sessionName);
      if (current && this.hasRoom(current) && (await this.check(current))) {
        this.bind(sessionName, current);
        return current;
      }
      return this.pickWorking(sessionName, new Set(current ? [current] : []));
    });
  }

  /** First unused proxy without a liveness check (DISABLE_PROXY_REPLACE). */
  acquireUnchecked(sessionName: string, current: string | null): Promise<string | null> {
    return this.exclusive(async () => {
      this.release(sessionName);
      const proxy = current && this.hasRoom(current) ? current : this.unused()[0] ?? null;
      if (proxy) this.bind(sessionName, proxy);
      return proxy;
    });
  }

  /** Swap a failed proxy for another working one; visible from the next cycle on. */
  replace(sessionName: string, failed: string): Promise<string | null> {
    return this.exclusive(async () => {
      this.release(sessionName);
      return this.pickWorking(sessionName, new Set([failed]));
    });
  }

  private async pickWorking(sessionName: string, exclude: ReadonlySet<string>): Promise<string | null> {
    for (const proxy of shuffle(this.unused(exclude), this.random)) {
      if (await this.check(proxy)) {
        this.bind(sessionName, proxy);
        return proxy;
      }
    }
    return null;
  }
}
