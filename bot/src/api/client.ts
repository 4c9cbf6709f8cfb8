import { CONSTELLATION_PAGE_SIZE } from "../constants/game.js";
import type { Constellation, GachaStrategy, InitData, Mission } from "../types.js";
import { log, type Logger } from "../utils/logger.js";
import {
  parseConstellations,
  parseMissions,
  parseReferralsClaimable,
  parseRewards,
  parseShop,
  parseUserData,
  type PlayerSnapshot,
  type Reward,
  type ShopSlot,
} from "./parse.js";
import { withRetry, type RetryPolicy } from "./retry.js";
import type { HttpMethod, Transport } from "./transport.js";

/** Supplies the signed Telegram init data attached to every request. */
export interface RequestSigner {
  initData(): InitData;
}

export interface ChallengeSeat {
  slotId: number;
  heroType: string;
}

/**
 * One method per game endpoint. Network failures are retried per the
 * RetryPolicy; game and auth errors surface on the first attempt.
 */
export class GameApiClient {
  constructor(
    private readonly transport: Transport,
    private readonly signer: RequestSigner,
    private readonly retry: RetryPolicy,
    private readonly logger: Logger = log,
    private readonly signal?: AbortSignal
  ) {}

  private call(method: HttpMethod, endpoint: string, body?: unknown): Promise<unknown> {
    return withRetry(
      this.retry,
      endpoint,
      () =>
        this.transport.request(method, endpoint, {
          params: this.signer.initData(),
          body,
          signal: this.signal,
        }),
      {
        signal: this.signal,
        onRetry: (attempt, error, waitMs) =>
          this.logger.warn(
            `${error.message}, retry ${attempt + 1}/${this.retry.maxAttempts} in ${(waitMs / 1000).toFixed(1)}s`
          ),
      }
    );
  }

  async getUserData(): Promise<PlayerSnapshot> {
    return parseUserData(await this.call("GET", "getUserData"));
  }

  async getConstellations(startIndex: number, amount: number = CONSTELLATION_PAGE_SIZE): Promise<Constellation[]> {
    const raw = await this.call("POST", "getConstellations", { startIndex, amount });
    return parseConstellations(raw, startIndex);
  }

  async getMissions(): Promise<Mission[]> {
    return parseMissions(await this.call("GET", "getMissions"));
  }

  async reportMissionEvent(missionKey: string): Promise<void> {
    await this.call("POST", "reportMissionEvent", { missionKey });
  }

  async claimMission(missionKey: string): Promise<Reward[]> {
    return parseRewards(await this.call("POST", "claimMission", { missionKey }));
  }

  async sendToChallenge(challengeType: string, heroes: ChallengeSeat[]): Promise<void> {
    await this.call("POST", "sendToChallenge", { challengeType, heroes });
  }

  async claimChallengesRewards(): Promise<Reward[]> {
    return parseRewards(await this.call("GET", "claimChallengesRewards"));
  }

  async claimDailyRewards(): Promise<Reward[]> {
    return parseRewards(await this.call("GET", "claimDailyRewards"));
  }

  async isReferralRewardClaimable(): Promise<boolean> {
    return parseReferralsClaimable(await this.call("POST", "getReferralsInfo", { page: 1, rowsPerPage: 20 }));
  }

  async claimReferralRewards(): Promise<Reward[]> {
    return parseRewards(await this.call("GET", "claimReferralRewards"));
  }

  async getShop(): Promise<ShopSlot[]> {
    return parseShop(await this.call("GET", "getShop"));
  }

  async buyShop(slotType: string): Promise<Reward[]> {
    return parseRewards(await this.call("POST", "buyShop", { slotType }));
  }

  async spendGacha(amount: number, strategy: GachaStrategy): Promise<Reward[]> {
    return parseRewards(await this.call("POST", "spendGacha", { amount, strategy }));
  }

  async levelUpHero(heroType: string): Promise<void> {
    await this.call("POST", "levelUpHero", { heroType });
  }

  async starUpHero(heroType: string): Promise<void> {
    await this.call("POST", "starUpHero", { heroType });
  }
}
