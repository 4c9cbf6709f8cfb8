import type { GameApiClient } from "../api/client.js";
import { GameLogicError } from "../errors.js";
import type { GameState } from "../types.js";
import type { Logger } from "../utils/logger.js";
import { formatNextTime } from "../utils/time.js";
import { formatRewards } from "./executor.js";

const FREE_SHOP_SLOT = "free";

/**
 * Collect the rewards that need no decision: daily reward, referral
 * rewards, finished challenges and free shop slots. A refused claim is
 * logged and the rest continue; other errors end the cycle.
 */
export async function collectRewards(client: GameApiClient, state: GameState, logger: Logger): Promise<number> {
  let claimed = 0;

  const attempt = async (label: string, fn: () => Promise<boolean>) => {
    try {
      if (await fn()) claimed++;
    } catch (error) {
      if (!(error instanceof GameLogicError)) throw error;
      logger.warn(`Couldn't claim ${label}: ${error.code}`);
    }
  };

  await attempt("daily reward", async () => {
    if (!state.meta.isNextDailyRewardAvailable) {
      logger.debug(`Daily reward next at: ${formatNextTime(state.meta.nextDailyRewardAt, state.now)}`);
      return false;
    }
    const rewards = await client.claimDailyRewards();
    logger.success(`Daily reward: ${formatRewards(rewards)}`);
    return true;
  });

  await attempt("referral rewards", async () => {
    if (!(await client.isReferralRewardClaimable())) return false;
    const rewards = await client.claimReferralRewards();
    logger.success(`Referral rewards: ${formatRewards(rewards)}`);
    return true;
  });

  await attempt("challenge rewards", async () => {
    const next = state.meta.nextChallengeClaimDate;
    // 0 means the game reported no pending challenge rewards
    if (next <= 0) return false;
    if (next > state.now) {
      logger.debug(`Challenge rewards next at: ${formatNextTime(next, state.now)}`);
      return false;
    }
    const rewards = await client.claimChallengesRewards();
    logger.farm(`Challenge rewards: ${formatRewards(rewards)}`);
    return true;
  });

  const shop = await client.getShop();
  for (const slot of shop) {
    if (slot.slotType !== FREE_SHOP_SLOT || slot.nextClaimAt > state.now) continue;
    await attempt(`shop slot ${slot.slotType}`, async () => {
      const rewards = await client.buyShop(slot.slotType);
      logger.shop(`Free shop slot ${slot.slotType}: ${formatRewards(rewards)}`);
      return true;
    });
  }

  return claimed;
}
