import { RESOURCE_TYPES } from "../constants/game.js";
import type {
  Challenge,
  ChallengeSlot,
  Constellation,
  GameState,
  Hero,
  PriorityMap,
  ResourceType,
} from "../types.js";

export interface ChallengeCandidate {
  constellationIndex: number;
  challenge: Challenge;
  slotId: number;
}

export function isResourceType(value: string): value is ResourceType {
  return RESOURCE_TYPES.some((r) => r === value);
}

/** Hero types currently seated in any challenge slot. */
export function seatedHeroes(constellations: Constellation[]): Set<string> {
  const seated = new Set<string>();
  for (const constellation of constellations) {
    for (const challenge of constellation.challenges) {
      for (const slot of challenge.slots) {
        if (slot.occupiedBy !== "empty" && slot.occupiedBy !== "") seated.add(slot.occupiedBy);
      }
    }
  }
  return seated;
}

export function isHeroReady(hero: Hero, state: GameState, seated: Set<string>): boolean {
  return hero.unlockAt <= state.now && !seated.has(hero.heroType);
}

export function isChallengeOpen(challenge: Challenge, now: number): boolean {
  return (
    challenge.challengeType !== "" &&
    challenge.received < challenge.value &&
    challenge.unlockAt <= now
  );
}

function isSlotFree(slot: ChallengeSlot, now: number): boolean {
  return slot.unlocked && slot.occupiedBy === "empty" && slot.unlockAt <= now;
}

/** First free slot this hero may take, or null when the hero does not qualify. */
export function findSeat(hero: Hero, challenge: Challenge, now: number): number | null {
  if (hero.level < challenge.minLevel) return null;
  if (hero.stars < challenge.minStars) return null;
  if (hero.power < challenge.power) return null;

  for (const slot of challenge.slots) {
    if (!isSlotFree(slot, now) || slot.heroClass === null) continue;
    if (hero.heroClass === "universal" || hero.heroClass === slot.heroClass) return slot.slotId;
  }
  return null;
}

/**
 * For each resource type, the first challenge (in constellation order, from
 * `startIndex`) the hero can be seated in. Challenges whose start key is in
 * `skip` are passed over.
 */
export function farmableResources(
  hero: Hero,
  state: GameState,
  startIndex: number,
  enabled: Record<ResourceType, boolean>,
  skip: ReadonlySet<string>
): Map<ResourceType, ChallengeCandidate> {
  const found = new Map<ResourceType, ChallengeCandidate>();
  const constellations = state.constellations
    .filter((c) => c.index >= startIndex)
    .sort((a, b) => a.index - b.index);

  for (const constellation of constellations) {
    for (const challenge of constellation.challenges) {
      const resource = challenge.resourceType;
      if (!isResourceType(resource) || !enabled[resource] || found.has(resource)) continue;
      if (!isChallengeOpen(challenge, state.now)) continue;
      if (skip.has(`start_challenge:${hero.heroType}:${challenge.challengeType}`)) continue;

      const slotId = findSeat(hero, challenge, state.now);
      if (slotId === null) continue;
      found.set(resource, { constellationIndex: constellation.index, challenge, slotId });
    }
  }
  return found;
}

/**
 * First challenge on an enabled resource, in constellation order from
 * `startIndex`, that has a free slot for this hero.
 */
export function firstFarmableChallenge(
  hero: Hero,
  state: GameState,
  startIndex: number,
  enabled: Record<ResourceType, boolean>,
  skip: ReadonlySet<string>
): (ChallengeCandidate & { resourceType: ResourceType }) | null {
  let first: (ChallengeCandidate & { resourceType: ResourceType }) | null = null;
  for (const [resourceType, candidate] of farmableResources(hero, state, startIndex, enabled, skip)) {
    const earlier =
      first === null ||
      candidate.constellationIndex < first.constellationIndex ||
      (candidate.constellationIndex === first.constellationIndex &&
        challengeOrder(state, candidate) < challengeOrder(state, first));
    if (earlier) first = { ...candidate, resourceType };
  }
  return first;
}

function challengeOrder(state: GameState, candidate: ChallengeCandidate): number {
  const constellation = state.constellations.find((c) => c.index === candidate.constellationIndex);
  return constellation ? constellation.challenges.indexOf(candidate.challenge) : -1;
}

/**
 * Lowest rank wins. Iterating in enumeration order with a strict comparison
 * breaks ties towards the earlier resource type.
 */
export function pickResource<T>(priorities: PriorityMap, candidates: Map<ResourceType, T>): ResourceType | null {
  let best: ResourceType | null = null;
  for (const resource of RESOURCE_TYPES) {
    if (!candidates.has(resource)) continue;
    if (best === null || priorities[resource] < priorities[best]) best = resource;
  }
  return best;
}
