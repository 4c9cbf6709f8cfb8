import { describe, it, expect, beforeEach } from "vitest";
import { DashboardEvents, type StateChangeEvent } from "../src/dashboard/events.js";
import { AuthError, GameLogicError, MaintenanceError, NetworkError } from "../src/errors.js";
import { SessionRunner, type ServiceFactory } from "../src/game/loop.js";
import { ProxyPool } from "../src/proxy/pool.js";
import { MemorySessionStore } from "../src/store/sessions.js";
import type { SessionConfig } from "../src/types.js";
import type { BotConfig } from "../src/config.js";
import { FakeAuthenticator, FakeTransport, NOW, makeConfig, silentLogger, testBotConfig } from "./helpers/fakes.js";

const FAR = 9_000_000_000_000;

interface ChallengeSpec {
  challengeType: string;
  resourceType: string;
  value: number;
  received: number;
  time: number;
}

const DEFAULT_CHALLENGES: ChallengeSpec[] = [
  { challengeType: "gold-0", resourceType: "gold", value: 100, received: 0, time: 3600 },
  { challengeType: "gacha-0", resourceType: "gacha", value: 100, received: 0, time: 1800 },
];

function challengeTypeOf(body: unknown): string | null {
  if (typeof body === "object" && body !== null && "challengeType" in body && typeof body.challengeType === "string") {
    return body.challengeType;
  }
  return null;
}

/** Minimal game backend: bonk alone, one constellation, seats filled by sendToChallenge. */
function gameBackend(options: { daily?: boolean; challenges?: ChallengeSpec[]; refuse?: string[] } = {}) {
  const seats: Record<string, string> = {};
  const challenges = options.challenges ?? DEFAULT_CHALLENGES;

  return new FakeTransport({
    getUserData: () => ({
      player: {
        resources: { gem: { amount: 0 } },
        heroes: [{ heroType: "bonk", name: "Bonk", class: "universal", level: 10, stars: 1, power: 100 }],
        meta: {
          isNextDailyRewardAvailable: options.daily ?? false,
          freeGachaNextClaim: FAR,
          nextChallengeClaimDate: FAR,
        },
      },
    }),
    getConstellations: () => ({
      constellations: [
        {
          name: "Aries",
          challenges: challenges.map((c) => ({
            ...c,
            minLevel: 1,
            minStars: 1,
            power: 10,
            orderedSlots: [{ heroClass: "warrior", occupiedBy: seats[c.challengeType] ?? "empty" }],
          })),
        },
      ],
    }),
    getReferralsInfo: () => ({ claimAvailible: false }),
    getShop: () => ({ shop: [] }),
    claimDailyRewards: () => ({ rewards: [{ type: "gem", amount: 5 }] }),
    sendToChallenge: (body) => {
      const challengeType = challengeTypeOf(body);
      if (challengeType && options.refuse?.includes(challengeType)) {
        throw new GameLogicError("sendToChallenge", "error_challenge_in_progress", 400);
      }
      if (challengeType) seats[challengeType] = "bonk";
      return {};
    },
  });
}

function failing(error: () => Error): FakeTransport {
  return new FakeTransport({
    getUserData: () => {
      throw error();
    },
  });
}

/** Sleeper that aborts shutdown on the n-th long (>= 60 s) wait. */
function abortingSleep(controller: AbortController, longWaits = 1) {
  const waits: number[] = [];
  let seen = 0;
  const sleep = async (ms: number) => {
    waits.push(ms);
    if (ms >= 60_000 && ++seen >= longWaits) controller.abort();
  };
  return { sleep, waits };
}

describe("SessionRunner", () => {
  let repo: MemorySessionStore;
  let events: DashboardEvents;
  let session: SessionConfig;
  let controller: AbortController;
  let config: BotConfig;

  beforeEach(async () => {
    repo = new MemorySessionStore();
    events = new DashboardEvents(() => NOW);
    session = makeConfig();
    await repo.save(session);
    controller = new AbortController();
    config = testBotConfig({ useProxy: false });
  });

  function runner(
    transport: FakeTransport,
    auth = new FakeAuthenticator(),
    overrides: { services?: ServiceFactory; pool?: ProxyPool; config?: BotConfig; longWaits?: number } = {}
  ) {
    const { sleep, waits } = abortingSleep(controller, overrides.longWaits);
    const instance = new SessionRunner(session, {
      config: overrides.config ?? config,
      repo,
      services: overrides.services ?? (() => ({ authenticator: auth, transport })),
      pool: overrides.pool,
      events,
      logger: silentLogger,
      sleep,
      random: () => 0.5,
      clock: () => NOW,
    });
    return { instance, waits };
  }

  function states(): string[] {
    return events
      .getRecentEvents()
      .filter((e): e is StateChangeEvent => e.type === "state_change")
      .map((e) => `${e.from}>${e.to}`);
  }

  it("runs a farming cycle, then sleeps for the longest busy challenge", async () => {
    const transport = gameBackend({ daily: true });
    const { instance, waits } = runner(transport);

    const outcome = await instance.run(controller.signal);

    expect(outcome).toEqual({ sessionName: "alpha", cycles: 1, reason: "shutdown" });
    expect(transport.calls("claimDailyRewards")).toHaveLength(1);
    expect(transport.calls("sendToChallenge").map((r) => r.body)).toEqual([
      { challengeType: "gold-0", heroes: [{ slotId: 0, heroType: "bonk" }] },
    ]);
    expect(waits).toEqual([3500, 3_600_000]);
    expect(states()).toEqual([
      "idle>authenticated",
      "authenticated>cycling",
      "cycling>sleeping",
      "sleeping>stopped",
    ]);
    expect(instance.currentState).toBe("stopped");
  });

  it("skips a refused action and continues the pass", async () => {
    const transport = gameBackend({ refuse: ["gold-0"] });
    const { instance, waits } = runner(transport);

    await instance.run(controller.signal);

    expect(transport.calls("sendToChallenge").map((r) => challengeTypeOf(r.body))).toEqual(["gold-0", "gacha-0"]);
    const summary = events.getRecentEvents().find((e) => e.type === "cycle_summary");
    expect(summary?.type === "cycle_summary" && summary.summary).toEqual({
      sessionName: "alpha",
      executed: 1,
      failed: 1,
      lastAction: "start_challenge(bonk → gacha @ constellation 0)",
      constellationIndex: 0,
      sleepSeconds: 1800,
    });
    expect(waits).toEqual([3500, 3500, 1_800_000]);
  });

  it("makes exactly REQUEST_RETRIES attempts and changes nothing when the network is down", async () => {
    const transport = failing(() => new NetworkError("getUserData", "timeout"));
    const { instance, waits } = runner(transport);

    const outcome = await instance.run(controller.signal);

    expect(transport.requests.map((r) => r.endpoint)).toEqual(["getUserData", "getUserData", "getUserData"]);
    expect(waits).toEqual([3500, 5000, 90_000]);
    expect(outcome.cycles).toBe(0);
    expect(await repo.load("alpha")).toEqual(session);
  });

  it("tracks constellation progress once the current one is complete", async () => {
    const transport = gameBackend({
      challenges: [{ challengeType: "gold-0", resourceType: "gold", value: 100, received: 100, time: 3600 }],
    });
    const { instance, waits } = runner(transport);

    await instance.run(controller.signal);

    expect((await repo.load("alpha"))?.trackedConstellationIndex).toBe(1);
    expect(waits).toEqual([2_100_000]);
  });

  it("leaves a pinned constellation override alone", async () => {
    session = makeConfig({ constellationLastIndex: 0 });
    await repo.save(session);
    const transport = gameBackend({
      challenges: [{ challengeType: "gold-0", resourceType: "gold", value: 100, received: 100, time: 3600 }],
    });
    const { instance } = runner(transport);

    await instance.run(controller.signal);

    expect(await repo.load("alpha")).toEqual(session);
  });

  it("backs off during maintenance", async () => {
    const { instance, waits } = runner(failing(() => new MaintenanceError("getUserData")));
    await instance.run(controller.signal);
    expect(waits).toEqual([450_000]);
  });

  it("stops when authorization is rejected at start", async () => {
    const transport = gameBackend();
    const auth = new FakeAuthenticator([new AuthError("telegram", "SESSION_REVOKED")]);
    const { instance } = runner(transport, auth);

    const outcome = await instance.run(controller.signal);

    expect(outcome).toEqual({ sessionName: "alpha", cycles: 0, reason: "authorization rejected" });
    expect(transport.requests).toHaveLength(0);
    expect(states()).toEqual(["idle>stopped"]);
  });

  it("retries a failed login after a pause", async () => {
    const auth = new FakeAuthenticator([new NetworkError("telegram", "FLOOD"), { hash: "test-secret" }]);
    const { instance, waits } = runner(gameBackend(), auth, { longWaits: 2 });

    const outcome = await instance.run(controller.signal);

    expect(auth.calls).toBe(2);
    expect(outcome.cycles).toBe(1);
    expect(waits[0]).toBe(90_000);
  });

  it("re-authorizes once and stops on a second auth failure", async () => {
    const auth = new FakeAuthenticator();
    const transport = failing(() => new AuthError("getUserData", "Unauthorized - bad hash", 401));
    const { instance } = runner(transport, auth);

    const outcome = await instance.run(controller.signal);

    expect(auth.calls).toBe(2);
    expect(outcome.reason).toBe("authorization rejected again: getUserData: Unauthorized - bad hash");
    expect(states()).toEqual([
      "idle>authenticated",
      "authenticated>cycling",
      "cycling>authenticated",
      "authenticated>cycling",
      "cycling>stopped",
    ]);
  });

  it("replaces an unhealthy proxy and retries the cycle", async () => {
    const A = "http://10.0.0.1:8080";
    const B = "http://10.0.0.2:8080";
    session = makeConfig({ proxy: A });
    await repo.save(session);

    const auth = new FakeAuthenticator();
    const dead = failing(() => new NetworkError("getUserData", "ECONNRESET"));
    const healthy = gameBackend();
    const built: Array<string | null> = [];
    const services: ServiceFactory = (s) => {
      built.push(s.proxy);
      return { authenticator: auth, transport: s.proxy === A ? dead : healthy };
    };
    const pool = new ProxyPool([A, B], 1, async () => true, () => 0.99);

    const { instance } = runner(healthy, auth, { services, pool, config: testBotConfig({ useProxy: true }) });
    const outcome = await instance.run(controller.signal);

    expect(outcome.cycles).toBe(1);
    expect(built).toEqual([A, B]);
    expect(dead.requests).toHaveLength(3);
    expect(healthy.calls("sendToChallenge")).toHaveLength(1);
    expect((await repo.load("alpha"))?.proxy).toBe(B);
    expect(pool.proxyOf("alpha")).toBe(B);
  });

  it("leaves a refused mission alone on the following cycles", async () => {
    session = makeConfig({ processMissions: true });
    await repo.save(session);
    const transport = gameBackend()
      .on("getMissions", () => ({ missions: [{ missionKey: "watch", claimed: false, progress: 1, condition: 1 }] }))
      .on("claimMission", () => {
        throw new GameLogicError("claimMission", "error_mission_not_completed", 400);
      });
    const { instance, waits } = runner(transport, undefined, { longWaits: 2 });

    const outcome = await instance.run(controller.signal);

    expect(outcome.cycles).toBe(2);
    expect(transport.calls("claimMission")).toHaveLength(1);
    expect(transport.calls("sendToChallenge")).toHaveLength(1);
    expect(waits).toEqual([3500, 3500, 3_600_000, 3_600_000]);
  });

  it("does not start a cycle after shutdown", async () => {
    const transport = gameBackend();
    const { instance } = runner(transport);
    controller.abort();

    const outcome = await instance.run(controller.signal);

    expect(outcome.reason).toBe("shutdown");
    expect(transport.requests).toHaveLength(0);
  });
});
