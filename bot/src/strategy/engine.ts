import { FARMING_HERO_TYPES, FARMING_HEROES, RESOURCE_TYPES } from "../constants/game.js";
import type { Action, BotDecision, FarmingHero, GameState, SessionConfig } from "../types.js";
import { farmableResources, firstFarmableChallenge, pickResource, seatedHeroes, isHeroReady } from "./challenges.js";
import { resolveConstellationIndex } from "./constellation.js";
import { packPurchaseAmount } from "./economy.js";
import { pickLevelUp, pickStarUp } from "./upgrades.js";

export interface SelectOptions {
  /** Keys (see actionKey) of actions already attempted this pass. */
  skip?: ReadonlySet<string>;
}

/** Stable identity of an action, used to avoid repeating a failed one within a pass. */
export function actionKey(action: Action): string {
  switch (action.kind) {
    case "start_challenge":
      return `start_challenge:${action.heroType}:${action.challengeType}`;
    case "claim_mission":
      return `claim_mission:${action.missionKey}`;
    case "buy_pack":
      return "buy_pack";
    case "spend_gacha":
      return `spend_gacha:${action.strategy}`;
    case "level_hero":
      return `level_hero:${action.heroType}`;
    case "star_up_hero":
      return `star_up_hero:${action.heroType}`;
    case "noop":
      return "noop";
  }
}

export function describeAction(action: Action): string {
  switch (action.kind) {
    case "start_challenge":
      return `start_challenge(${action.hero} → ${action.resourceType} @ constellation ${action.constellationIndex})`;
    case "claim_mission":
      return `claim_mission(${action.missionKey})`;
    case "buy_pack":
      return `buy_pack(x${action.amount})`;
    case "spend_gacha":
      return `spend_gacha(${action.strategy})`;
    case "level_hero":
      return `level_hero(${action.heroType})`;
    case "star_up_hero":
      return `star_up_hero(${action.heroType})`;
    case "noop":
      return "noop";
  }
}

function noop(reason: string): BotDecision {
  return { action: { kind: "noop", reason }, reason };
}

function anyFarmingEnabled(config: SessionConfig): boolean {
  return RESOURCE_TYPES.some((r) => config.farm[r]);
}

function decideChallenge(
  hero: FarmingHero,
  state: GameState,
  config: SessionConfig,
  startIndex: number,
  skip: ReadonlySet<string>,
  seated: Set<string>
): BotDecision | null {
  const heroType = FARMING_HERO_TYPES[hero];
  const owned = state.heroes.find((h) => h.heroType === heroType);
  if (!owned || !isHeroReady(owned, state, seated)) return null;

  const candidates = farmableResources(owned, state, startIndex, config.farm, skip);
  const resourceType = pickResource(config.priorities[hero], candidates);
  if (resourceType === null) return null;

  const candidate = candidates.get(resourceType);
  if (!candidate) return null;

  return {
    action: {
      kind: "start_challenge",
      hero,
      heroType,
      resourceType,
      challengeType: candidate.challenge.challengeType,
      constellationIndex: candidate.constellationIndex,
      slotId: candidate.slotId,
    },
    reason:
      `${hero} → ${candidate.challenge.name} (${resourceType}, priority ${config.priorities[hero][resourceType]}, ` +
      `progress ${candidate.challenge.received}/${candidate.challenge.value})`,
  };
}

/**
 * Farming policy. Pure: the same (state, config, skip) always yields the
 * same decision.
 *
 * Candidates, first eligible wins:
 * 1. Mission claims (PROCESS_MISSIONS)
 * 2. Free gacha when due, then owned gacha tokens (SPEND_GACHAS)
 * 3. Gem-bought gacha packs that keep gems at or above GEMS_SAFE_BALANCE
 * 4. Star-ups and level-ups (UPGRADE_CARDS, only while farming is on)
 * 5. Constellation challenges for bonk, then dragon, by resource priority
 * 6. Any other ready hero, in roster order, on the first open challenge
 *    with a free slot for it
 */
export function decide(state: GameState, config: SessionConfig, options: SelectOptions = {}): BotDecision {
  const skip = options.skip ?? new Set<string>();
  const farming = anyFarmingEnabled(config);

  if (!farming && !config.processMissions && !config.spendGachas && !config.buyGachaPacks) {
    return noop("all farming, mission and gacha toggles are off");
  }

  if (config.processMissions) {
    const mission = state.missions.find((m) => !m.claimed && !skip.has(`claim_mission:${m.missionKey}`));
    if (mission) {
      const needsEvent = mission.progress < mission.condition;
      return {
        action: { kind: "claim_mission", missionKey: mission.missionKey, needsEvent },
        reason: `Mission ${mission.missionKey} (${mission.progress}/${mission.condition})`,
      };
    }
  }

  if (config.spendGachas) {
    if (state.meta.freeGachaNextClaim <= state.now && !skip.has("spend_gacha:free")) {
      return { action: { kind: "spend_gacha", strategy: "free", amount: 1 }, reason: "Free gacha is available" };
    }
    if (state.resources.gacha > 0 && !skip.has("spend_gacha:gacha")) {
      return {
        action: { kind: "spend_gacha", strategy: "gacha", amount: 1 },
        reason: `${state.resources.gacha} gacha tokens to spend`,
      };
    }
  }

  if (config.buyGachaPacks && !skip.has("buy_pack")) {
    const cost = state.costs.gachaGemCost;
    const amount = packPurchaseAmount(state.resources.gem, cost, config.gemsSafeBalance);
    if (amount > 0) {
      return {
        action: { kind: "buy_pack", amount },
        reason: `Gems ${state.resources.gem} cover ${amount} pack(s) at ${cost} above safe balance ${config.gemsSafeBalance}`,
      };
    }
    // Suppressed: a purchase would breach the safe balance; fall through
  }

  if (!farming) return noop("no farming toggle is on");

  if (config.upgradeCards) {
    const starUp = pickStarUp(state, skip);
    if (starUp) {
      return {
        action: { kind: "star_up_hero", heroType: starUp.heroType },
        reason: `${starUp.name} has ${state.heroCards[starUp.heroType]} cards (needs ${starUp.costStar})`,
      };
    }
    const levelUp = pickLevelUp(state, skip);
    if (levelUp) {
      return {
        action: { kind: "level_hero", heroType: levelUp.heroType },
        reason: `${levelUp.name} L${levelUp.level} costs ${levelUp.costLevelGold} gold, ${levelUp.costLevelGreen} green`,
      };
    }
  }

  const startIndex = resolveConstellationIndex(config, state.reportedConstellationIndex);
  const seated = seatedHeroes(state.constellations);
  for (const hero of FARMING_HEROES) {
    const decision = decideChallenge(hero, state, config, startIndex, skip, seated);
    if (decision) return decision;
  }

  const farmingTypes = new Set<string>(Object.values(FARMING_HERO_TYPES));
  for (const hero of state.heroes) {
    if (farmingTypes.has(hero.heroType) || !isHeroReady(hero, state, seated)) continue;
    const candidate = firstFarmableChallenge(hero, state, startIndex, config.farm, skip);
    if (!candidate) continue;
    return {
      action: {
        kind: "start_challenge",
        hero: hero.heroType,
        heroType: hero.heroType,
        resourceType: candidate.resourceType,
        challengeType: candidate.challenge.challengeType,
        constellationIndex: candidate.constellationIndex,
        slotId: candidate.slotId,
      },
      reason: `${hero.name} → ${candidate.challenge.name} (${candidate.resourceType}, first free seat)`,
    };
  }

  return noop("no enabled resource is farmable by a ready hero");
}

export function selectAction(state: GameState, config: SessionConfig, options: SelectOptions = {}): Action {
  return decide(state, config, options).action;
}
