import { CONSTELLATION_PAGE_SIZE } from "../constants/game.js";
import { resolveConstellationIndex } from "../strategy/constellation.js";
import type { GameState, SessionConfig } from "../types.js";
import type { GameApiClient } from "./client.js";

export interface FetchedState {
  state: GameState;
  startIndex: number;
}

/**
 * Assemble a full GameState: player snapshot, one page of constellations
 * from the starting index, and missions when they are processed.
 */
export async function fetchGameState(
  client: GameApiClient,
  config: SessionConfig,
  clock: () => number = Date.now
): Promise<FetchedState> {
  const player = await client.getUserData();
  const startIndex = resolveConstellationIndex(config, player.reportedConstellationIndex);
  const constellations = await client.getConstellations(startIndex, CONSTELLATION_PAGE_SIZE);
  const missions = config.processMissions ? await client.getMissions() : [];

  return {
    state: {
      now: clock(),
      resources: player.resources,
      heroCards: player.heroCards,
      heroes: player.heroes,
      constellations,
      missions,
      costs: player.costs,
      meta: player.meta,
      reportedConstellationIndex: player.reportedConstellationIndex,
    },
    startIndex,
  };
}

/** Longest remaining run (seconds) among challenges that have a hero seated. */
export function longestRunningChallenge(state: GameState): number {
  let longest = 0;
  for (const constellation of state.constellations) {
    for (const challenge of constellation.challenges) {
      if (challenge.received >= challenge.value) continue;
      const busy = challenge.slots.some((s) => s.occupiedBy !== "empty" && s.occupiedBy !== "");
      if (busy && challenge.time > longest) longest = challenge.time;
    }
  }
  return longest;
}
