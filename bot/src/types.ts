import type { FARMING_HEROES, RESOURCE_TYPES } from "./constants/game.js";

export type ResourceType = (typeof RESOURCE_TYPES)[number];

export type FarmingHero = (typeof FARMING_HEROES)[number];

export type PriorityMap = Record<ResourceType, number>;

export interface SessionConfig {
  sessionName: string;
  farm: Record<ResourceType, boolean>;
  priorities: Record<FarmingHero, PriorityMap>;
  /** Manual override of the starting constellation; null means follow the game. */
  constellationLastIndex: number | null;
  /** When false a manual override stays pinned after completions. */
  constellationAutoAdvance: boolean;
  /** Runner-maintained progress used when the game reports no index. */
  trackedConstellationIndex: number | null;
  gemsSafeBalance: number;
  buyGachaPacks: boolean;
  spendGachas: boolean;
  processMissions: boolean;
  upgradeCards: boolean;
  proxy: string | null;
  userAgent: string;
}

export interface Resources {
  gem: number;
  gold: number;
  greenStones: number;
  purpleStones: number;
  gacha: number;
  points: number;
}

export type HeroRarity = "rare" | "epic" | "legendary" | "special";

export interface Hero {
  heroType: string;
  name: string;
  heroClass: string;
  level: number;
  stars: number;
  power: number;
  unlockAt: number;
  costLevelGold: number;
  costLevelGreen: number;
  costStar: number;
}

export interface ChallengeSlot {
  slotId: number;
  heroClass: string | null;
  unlocked: boolean;
  unlockAt: number;
  occupiedBy: string;
}

export interface Challenge {
  challengeType: string;
  name: string;
  resourceType: string;
  value: number;
  received: number;
  unlockAt: number;
  minLevel: number;
  minStars: number;
  power: number;
  /** Seconds a run takes once started. */
  time: number;
  slots: ChallengeSlot[];
}

export interface Constellation {
  index: number;
  name: string;
  challenges: Challenge[];
}

export interface Mission {
  missionKey: string;
  claimed: boolean;
  progress: number;
  condition: number;
  rewards: { resourceType: string; amount: number }[];
}

export interface PlayerMeta {
  isNextDailyRewardAvailable: boolean;
  nextDailyRewardAt: number;
  freeGachaNextClaim: number;
  nextChallengeClaimDate: number;
}

export interface GameState {
  /** Timestamp (ms) the state was fetched at; readiness checks compare against it. */
  now: number;
  resources: Resources;
  heroCards: Record<string, number>;
  heroes: Hero[];
  constellations: Constellation[];
  missions: Mission[];
  costs: { gachaGemCost: number };
  meta: PlayerMeta;
  reportedConstellationIndex: number | null;
}

export type GachaStrategy = "free" | "gacha" | "gem";

export type Action =
  | {
      kind: "start_challenge";
      /** "bonk" or "dragon" for the farming heroes, the hero type for the rest of the roster. */
      hero: string;
      heroType: string;
      resourceType: ResourceType;
      challengeType: string;
      constellationIndex: number;
      slotId: number;
    }
  | { kind: "claim_mission"; missionKey: string; needsEvent: boolean }
  | { kind: "buy_pack"; amount: number }
  | { kind: "spend_gacha"; strategy: Exclude<GachaStrategy, "gem">; amount: number }
  | { kind: "level_hero"; heroType: string }
  | { kind: "star_up_hero"; heroType: string }
  | { kind: "noop"; reason: string };

export type ActionKind = Action["kind"];

export interface BotDecision {
  action: Action;
  reason: string;
}

export type RunnerState = "idle" | "authenticated" | "cycling" | "sleeping" | "stopped";

export interface CycleSummary {
  sessionName: string;
  executed: number;
  failed: number;
  lastAction: string;
  constellationIndex: number;
  /** Seconds until the next cycle. */
  sleepSeconds: number;
}

export type InitData = Record<string, string>;
