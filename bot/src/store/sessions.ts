import { eq } from "drizzle-orm";
import { FARMING_HEROES, RESOURCE_TYPES } from "../constants/game.js";
import { ConfigError } from "../errors.js";
import type { FarmingHero, PriorityMap, ResourceType, SessionConfig } from "../types.js";
import type { SessionDb } from "./db.js";
import { sessions, type SessionRow } from "./schema.js";

export type SessionPatch = Partial<Omit<SessionConfig, "sessionName">>;

/** Persistence boundary for per-account settings, keyed by session name. */
export interface SessionConfigRepository {
  load(sessionName: string): Promise<SessionConfig | null>;
  save(config: SessionConfig): Promise<void>;
  update(sessionName: string, patch: SessionPatch): Promise<SessionConfig>;
  list(): Promise<SessionConfig[]>;
  remove(sessionName: string): Promise<boolean>;
}

export const DEFAULT_PRIORITIES: Record<FarmingHero, PriorityMap> = {
  bonk: { greenStones: 3, purpleStones: 4, gold: 1, gacha: 2, points: 5 },
  dragon: { greenStones: 2, purpleStones: 1, gold: 3, gacha: 4, points: 5 },
};

export function defaultSessionConfig(sessionName: string, userAgent: string): SessionConfig {
  return {
    sessionName,
    farm: { greenStones: true, purpleStones: true, gold: true, gacha: true, points: true },
    priorities: {
      bonk: { ...DEFAULT_PRIORITIES.bonk },
      dragon: { ...DEFAULT_PRIORITIES.dragon },
    },
    constellationLastIndex: null,
    constellationAutoAdvance: false,
    trackedConstellationIndex: null,
    gemsSafeBalance: 100000,
    buyGachaPacks: false,
    spendGachas: false,
    processMissions: false,
    upgradeCards: true,
    proxy: null,
    userAgent,
  };
}

function isNonNegativeInt(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Throws ConfigError describing the first invalid field. */
export function validateSessionConfig(config: SessionConfig): SessionConfig {
  const where = config.sessionName;
  for (const hero of FARMING_HEROES) {
    for (const resource of RESOURCE_TYPES) {
      const rank = config.priorities[hero][resource];
      if (!Number.isInteger(rank) || rank < 1 || rank > 5) {
        throw new ConfigError(`${where}: ${hero} priority for ${resource} must be 1..5, got ${rank}`);
      }
    }
  }
  if (!isNonNegativeInt(config.gemsSafeBalance)) {
    throw new ConfigError(`${where}: gems safe balance must be a non-negative integer`);
  }
  if (config.constellationLastIndex !== null && !isNonNegativeInt(config.constellationLastIndex)) {
    throw new ConfigError(`${where}: constellation index must be a non-negative integer`);
  }
  if (config.trackedConstellationIndex !== null && !isNonNegativeInt(config.trackedConstellationIndex)) {
    throw new ConfigError(`${where}: tracked constellation index must be a non-negative integer`);
  }
  if (!config.userAgent) {
    throw new ConfigError(`${where}: user agent is missing`);
  }
  return config;
}

function parseJson(sessionName: string, field: string, json: string): unknown {
  try {
    return JSON.parse(json);
  } catch {
    throw new ConfigError(`${sessionName}: ${field} is not valid JSON`);
  }
}

function parseFarm(sessionName: string, json: string): Record<ResourceType, boolean> {
  const raw = parseJson(sessionName, "farm", json);
  if (!isRecord(raw)) throw new ConfigError(`${sessionName}: farm must be an object`);
  const farm = { greenStones: true, purpleStones: true, gold: true, gacha: true, points: true };
  for (const resource of RESOURCE_TYPES) {
    const value = raw[resource];
    if (value === undefined) continue;
    if (typeof value !== "boolean") throw new ConfigError(`${sessionName}: farm.${resource} must be a boolean`);
    farm[resource] = value;
  }
  return farm;
}

function parsePriorities(sessionName: string, json: string): Record<FarmingHero, PriorityMap> {
  const raw = parseJson(sessionName, "priorities", json);
  if (!isRecord(raw)) throw new ConfigError(`${sessionName}: priorities must be an object`);
  const priorities = {
    bonk: { ...DEFAULT_PRIORITIES.bonk },
    dragon: { ...DEFAULT_PRIORITIES.dragon },
  };
  for (const hero of FARMING_HEROES) {
    const ranks = raw[hero];
    if (ranks === undefined) continue;
    if (!isRecord(ranks)) throw new ConfigError(`${sessionName}: priorities.${hero} must be an object`);
    for (const resource of RESOURCE_TYPES) {
      const rank = ranks[resource];
      if (rank === undefined) continue;
      if (typeof rank !== "number") {
        throw new ConfigError(`${sessionName}: priorities.${hero}.${resource} must be a number`);
      }
      priorities[hero][resource] = rank;
    }
  }
  return priorities;
}

export function rowToConfig(row: SessionRow): SessionConfig {
  return validateSessionConfig({
    sessionName: row.sessionName,
    farm: parseFarm(row.sessionName, row.farmJson),
    priorities: parsePriorities(row.sessionName, row.prioritiesJson),
    constellationLastIndex: row.constellationLastIndex,
    constellationAutoAdvance: row.constellationAutoAdvance,
    trackedConstellationIndex: row.trackedConstellationIndex,
    gemsSafeBalance: row.gemsSafeBalance,
    buyGachaPacks: row.buyGachaPacks,
    spendGachas: row.spendGachas,
    processMissions: row.processMissions,
    upgradeCards: row.upgradeCards,
    proxy: row.proxy,
    userAgent: row.userAgent,
  });
}

function configToRow(config: SessionConfig) {
  return {
    proxy: config.proxy,
    userAgent: config.userAgent,
    farmJson: JSON.stringify(config.farm),
    prioritiesJson: JSON.stringify(config.priorities),
    constellationLastIndex: config.constellationLastIndex,
    constellationAutoAdvance: config.constellationAutoAdvance,
    trackedConstellationIndex: config.trackedConstellationIndex,
    gemsSafeBalance: config.gemsSafeBalance,
    buyGachaPacks: config.buyGachaPacks,
    spendGachas: config.spendGachas,
    processMissions: config.processMissions,
    upgradeCards: config.upgradeCards,
    updatedAt: new Date(),
  };
}

export class SqliteSessionStore implements SessionConfigRepository {
  constructor(private readonly db: SessionDb) {}

  async load(sessionName: string): Promise<SessionConfig | null> {
    const [row] = await this.db
      .select()
      .from(sessions)
      .where(eq(sessions.sessionName, sessionName))
      .limit(1);
    return row ? rowToConfig(row) : null;
  }

  async save(config: SessionConfig): Promise<void> {
    validateSessionConfig(config);
    const values = configToRow(config);
    await this.db
      .insert(sessions)
      .values({ sessionName: config.sessionName, ...values })
      .onConflictDoUpdate({ target: sessions.sessionName, set: values });
  }

  async update(sessionName: string, patch: SessionPatch): Promise<SessionConfig> {
    const current = await this.load(sessionName);
    if (!current) throw new ConfigError(`${sessionName}: no stored settings to update`);
    const next: SessionConfig = { ...current, ...patch, sessionName };
    await this.save(next);
    return next;
  }

  async list(): Promise<SessionConfig[]> {
    const rows = await this.db.select().from(sessions).orderBy(sessions.sessionName);
    return rows.map(rowToConfig);
  }

  async remove(sessionName: string): Promise<boolean> {
    const deleted = await this.db
      .delete(sessions)
      .where(eq(sessions.sessionName, sessionName))
      .returning({ sessionName: sessions.sessionName });
    return deleted.length > 0;
  }
}

function cloneConfig(config: SessionConfig): SessionConfig {
  return {
    ...config,
    farm: { ...config.farm },
    priorities: { bonk: { ...config.priorities.bonk }, dragon: { ...config.priorities.dragon } },
  };
}

/** Store kept in process memory only. */
export class MemorySessionStore implements SessionConfigRepository {
  private readonly rows = new Map<string, SessionConfig>();

  async load(sessionName: string): Promise<SessionConfig | null> {
    const config = this.rows.get(sessionName);
    return config ? cloneConfig(config) : null;
  }

  async save(config: SessionConfig): Promise<void> {
    this.rows.set(config.sessionName, cloneConfig(validateSessionConfig(config)));
  }

  async update(sessionName: string, patch: SessionPatch): Promise<SessionConfig> {
    const current = this.rows.get(sessionName);
    if (!current) throw new ConfigError(`${sessionName}: no stored settings to update`);
    const next: SessionConfig = { ...cloneConfig(current), ...patch, sessionName };
    await this.save(next);
    return cloneConfig(next);
  }

  async list(): Promise<SessionConfig[]> {
    return [...this.rows.keys()].sort().flatMap((name) => {
      const config = this.rows.get(name);
      return config ? [cloneConfig(config)] : [];
    });
  }

  async remove(sessionName: string): Promise<boolean> {
    return this.rows.delete(sessionName);
  }
}

/** Load settings for a session, creating them with defaults on first run. */
export async function loadOrCreateSession(
  repo: SessionConfigRepository,
  sessionName: string,
  userAgent: () => string
): Promise<SessionConfig> {
  const existing = await repo.load(sessionName);
  if (existing) return existing;
  const created = defaultSessionConfig(sessionName, userAgent());
  await repo.save(created);
  return created;
}
