import type { GameApiClient } from "../api/client.js";
import type { Reward } from "../api/parse.js";
import { describeAction } from "../strategy/engine.js";
import type { Action } from "../types.js";
import type { Logger } from "../utils/logger.js";

export interface ExecutionContext {
  client: GameApiClient;
  logger: Logger;
  /** Pause between reporting a mission event and claiming it. */
  pause: () => Promise<void>;
}

export function formatRewards(rewards: Reward[]): string {
  if (rewards.length === 0) return "nothing";
  return rewards.map((r) => `${r.amount} ${r.name}`).join(", ");
}

/**
 * Perform one policy action against the game API and return a short result
 * description. Errors propagate; the runner decides what a failure means.
 */
export async function executeAction(action: Action, ctx: ExecutionContext): Promise<string> {
  const { client, logger } = ctx;

  switch (action.kind) {
    case "start_challenge": {
      await client.sendToChallenge(action.challengeType, [{ slotId: action.slotId, heroType: action.heroType }]);
      logger.farm(
        `Sent ${action.hero} to ${action.challengeType} for ${action.resourceType} (constellation ${action.constellationIndex})`
      );
      return `sent ${action.hero} to ${action.challengeType}`;
    }

    case "claim_mission": {
      if (action.needsEvent) {
        await client.reportMissionEvent(action.missionKey);
        await ctx.pause();
      }
      const rewards = await client.claimMission(action.missionKey);
      logger.mission(`Claimed mission ${action.missionKey}: ${formatRewards(rewards)}`);
      return `mission ${action.missionKey}: ${formatRewards(rewards)}`;
    }

    case "buy_pack": {
      const rewards = await client.spendGacha(action.amount, "gem");
      logger.shop(`Bought ${action.amount} gacha pack(s) for gems: ${formatRewards(rewards)}`);
      return `bought ${action.amount} pack(s): ${formatRewards(rewards)}`;
    }

    case "spend_gacha": {
      const rewards = await client.spendGacha(action.amount, action.strategy);
      logger.shop(`Opened ${action.strategy} gacha: ${formatRewards(rewards)}`);
      return `${action.strategy} gacha: ${formatRewards(rewards)}`;
    }

    case "level_hero": {
      await client.levelUpHero(action.heroType);
      logger.hero(`Leveled up ${action.heroType}`);
      return `leveled ${action.heroType}`;
    }

    case "star_up_hero": {
      await client.starUpHero(action.heroType);
      logger.hero(`Starred up ${action.heroType}`);
      return `starred ${action.heroType}`;
    }

    case "noop":
      logger.debug(`Nothing to do: ${action.reason}`);
      return describeAction(action);
  }
}
