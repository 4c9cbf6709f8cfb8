import { DEFAULT_GACHA_GEM_COST } from "../constants/game.js";
import type {
  Challenge,
  ChallengeSlot,
  Constellation,
  Hero,
  Mission,
  PlayerMeta,
  Resources,
} from "../types.js";

// The backend owns these schemas; every field is read defensively with a default.

type Json = Record<string, unknown>;

function isJson(value: unknown): value is Json {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function obj(value: unknown): Json {
  return isJson(value) ? value : {};
}

function arr(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function num(value: unknown, fallback = 0): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) return Number(value);
  return fallback;
}

function str(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value : fallback;
}

function bool(value: unknown, fallback = false): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function amountOf(resources: Json, key: string): number {
  return num(obj(resources[key]).amount);
}

export interface PlayerSnapshot {
  resources: Resources;
  heroCards: Record<string, number>;
  heroes: Hero[];
  costs: { gachaGemCost: number };
  meta: PlayerMeta;
  reportedConstellationIndex: number | null;
}

export function parseHero(raw: unknown): Hero {
  const h = obj(raw);
  return {
    heroType: str(h.heroType),
    name: str(h.name, str(h.heroType)),
    heroClass: str(h.class),
    level: num(h.level),
    stars: num(h.stars),
    power: num(h.power),
    unlockAt: num(h.unlockAt),
    costLevelGold: num(h.costLevelGold),
    costLevelGreen: num(h.costLevelGreen),
    costStar: num(h.costStar),
  };
}

export function parseUserData(raw: unknown): PlayerSnapshot {
  const player = obj(obj(raw).player);
  const resources = obj(player.resources);
  const meta = obj(player.meta);

  const heroCards: Record<string, number> = {};
  for (const card of arr(resources.heroCard)) {
    const c = obj(card);
    const heroType = str(c.heroType);
    const amount = num(c.amount);
    if (heroType && amount > 0) heroCards[heroType] = amount;
  }

  const reported = meta.constellationsLastIndex ?? meta.constellationLastIndex;

  return {
    resources: {
      gem: amountOf(resources, "gem"),
      gold: amountOf(resources, "gold"),
      greenStones: amountOf(resources, "greenStones"),
      purpleStones: amountOf(resources, "purpleStones"),
      gacha: amountOf(resources, "gacha"),
      points: amountOf(resources, "points"),
    },
    heroCards,
    heroes: arr(player.heroes).map(parseHero).filter((h) => h.heroType !== ""),
    costs: { gachaGemCost: num(obj(player.costs).gachaGemCost, DEFAULT_GACHA_GEM_COST) },
    meta: {
      isNextDailyRewardAvailable: bool(meta.isNextDailyRewardAvailable),
      nextDailyRewardAt: num(meta.nextDailyRewardAt),
      freeGachaNextClaim: num(meta.freeGachaNextClaim),
      nextChallengeClaimDate: num(meta.nextChallengeClaimDate),
    },
    reportedConstellationIndex: typeof reported === "number" && reported >= 0 ? reported : null,
  };
}

function parseSlot(raw: unknown, slotId: number): ChallengeSlot {
  const s = obj(raw);
  return {
    slotId,
    heroClass: typeof s.heroClass === "string" ? s.heroClass : null,
    unlocked: bool(s.unlocked, true),
    unlockAt: num(s.unlockAt),
    occupiedBy: str(s.occupiedBy, "empty"),
  };
}

export function parseChallenge(raw: unknown): Challenge {
  const c = obj(raw);
  return {
    challengeType: str(c.challengeType),
    name: str(c.name, "Unknown challenge"),
    resourceType: str(c.resourceType),
    value: num(c.value),
    received: num(c.received),
    unlockAt: num(c.unlockAt),
    minLevel: num(c.minLevel, 1),
    minStars: num(c.minStars, 1),
    power: num(c.power),
    time: num(c.time),
    slots: arr(c.orderedSlots).map(parseSlot),
  };
}

/** Constellations are numbered from `startIndex` in response order. */
export function parseConstellations(raw: unknown, startIndex: number): Constellation[] {
  return arr(obj(raw).constellations).map((entry, i) => {
    const c = obj(entry);
    return {
      index: startIndex + i,
      name: str(c.name, "Unknown"),
      challenges: arr(c.challenges).map(parseChallenge),
    };
  });
}

export function parseMissions(raw: unknown): Mission[] {
  return arr(obj(raw).missions)
    .map((entry) => {
      const m = obj(entry);
      return {
        missionKey: str(m.missionKey),
        claimed: bool(m.claimed),
        progress: num(m.progress),
        condition: num(m.condition, 1),
        rewards: arr(m.rewards).map((r) => ({
          resourceType: str(obj(r).resourceType, "unknown"),
          amount: num(obj(r).amount),
        })),
      };
    })
    .filter((m) => m.missionKey !== "");
}

export interface ShopSlot {
  slotType: string;
  nextClaimAt: number;
  content: { resourceType: string; amount: number }[];
}

export function parseShop(raw: unknown): ShopSlot[] {
  return arr(obj(raw).shop).map((entry) => {
    const s = obj(entry);
    return {
      slotType: str(s.slotType),
      // Missing timestamp means "not claimable"
      nextClaimAt: num(s.nextClaimAt, Number.MAX_SAFE_INTEGER),
      content: arr(s.content).map((item) => ({
        resourceType: str(obj(item).resourceType, "Unknown"),
        amount: num(obj(item).amount),
      })),
    };
  });
}

export interface Reward {
  name: string;
  type: string;
  amount: number;
}

/** Reward lists come back either as an array or as {resourceType: {amount}}. */
export function parseRewards(raw: unknown): Reward[] {
  const body = obj(raw);
  const rewards = body.rewards ?? raw;
  if (Array.isArray(rewards)) {
    return rewards.map((r) => {
      const o = obj(r);
      const type = str(o.type, str(o.resourceType, "Unknown"));
      return { name: str(o.name, type), type, amount: num(o.amount, 1) };
    });
  }
  return Object.entries(obj(rewards))
    .filter(([, v]) => v !== null && typeof v === "object")
    .map(([type, v]) => ({ name: type, type, amount: num(obj(v).amount) }));
}

export function parseReferralsClaimable(raw: unknown): boolean {
  // The backend spells it "claimAvailible"
  const body = obj(raw);
  return bool(body.claimAvailible, bool(body.claimAvailable));
}
