import { describe, it, expect } from "vitest";
import { GameApiClient } from "../src/api/client.js";
import { GameLogicError } from "../src/errors.js";
import { executeAction, formatRewards } from "../src/game/executor.js";
import { collectRewards } from "../src/game/rewards.js";
import { FakeTransport, NOW, instantRetry, makeState, silentLogger } from "./helpers/fakes.js";

function clientFor(transport: FakeTransport) {
  return new GameApiClient(transport, { initData: () => ({ hash: "test-secret" }) }, instantRetry(1), silentLogger);
}

describe("executeAction", () => {
  it("reports a mission event before claiming it", async () => {
    const order: string[] = [];
    const transport = new FakeTransport({
      reportMissionEvent: () => {
        order.push("report");
        return {};
      },
      claimMission: () => {
        order.push("claim");
        return { rewards: [{ type: "gold", name: "Gold", amount: 20 }] };
      },
    });
    const pause = async () => {
      order.push("pause");
    };

    const detail = await executeAction(
      { kind: "claim_mission", missionKey: "watch", needsEvent: true },
      { client: clientFor(transport), logger: silentLogger, pause }
    );

    expect(order).toEqual(["report", "pause", "claim"]);
    expect(detail).toBe("mission watch: 20 Gold");
  });

  it("buys packs with gems", async () => {
    const transport = new FakeTransport({ spendGacha: () => ({ rewards: [] }) });
    await executeAction(
      { kind: "buy_pack", amount: 10 },
      { client: clientFor(transport), logger: silentLogger, pause: async () => undefined }
    );
    expect(transport.calls("spendGacha")[0].body).toEqual({ amount: 10, strategy: "gem" });
  });

  it("lets game refusals propagate", async () => {
    const transport = new FakeTransport({
      levelUpHero: () => {
        throw new GameLogicError("levelUpHero", "error_level_up_no_resources", 400);
      },
    });
    await expect(
      executeAction(
        { kind: "level_hero", heroType: "bonk" },
        { client: clientFor(transport), logger: silentLogger, pause: async () => undefined }
      )
    ).rejects.toBeInstanceOf(GameLogicError);
  });
});

describe("formatRewards", () => {
  it("joins amounts and names", () => {
    expect(formatRewards([])).toBe("nothing");
    expect(formatRewards([{ name: "gem", type: "gem", amount: 5 }, { name: "Gold", type: "gold", amount: 1 }])).toBe(
      "5 gem, 1 Gold"
    );
  });
});

describe("collectRewards", () => {
  it("claims what is due and carries on after a refused claim", async () => {
    const transport = new FakeTransport({
      claimDailyRewards: () => {
        throw new GameLogicError("claimDailyRewards", "error_already_claimed", 400);
      },
      getReferralsInfo: () => ({ claimAvailible: true }),
      claimReferralRewards: () => ({ rewards: [] }),
      claimChallengesRewards: () => ({ rewards: [] }),
      getShop: () => ({ shop: [{ slotType: "free", nextClaimAt: NOW }] }),
      buyShop: () => ({ rewards: [] }),
    });
    const state = makeState({
      meta: { isNextDailyRewardAvailable: true, nextDailyRewardAt: 0, freeGachaNextClaim: 0, nextChallengeClaimDate: NOW },
    });

    const claimed = await collectRewards(clientFor(transport), state, silentLogger);

    expect(claimed).toBe(3);
    expect(transport.calls("buyShop").map((r) => r.body)).toEqual([{ slotType: "free" }]);
  });

  it("never buys paid shop slots", async () => {
    const transport = new FakeTransport({
      getReferralsInfo: () => ({ claimAvailible: false }),
      getShop: () => ({
        shop: [
          { slotType: "gemPack", nextClaimAt: 0 },
          { slotType: "free", nextClaimAt: NOW + 1 },
        ],
      }),
      buyShop: () => ({ rewards: [] }),
    });

    const claimed = await collectRewards(clientFor(transport), makeState(), silentLogger);

    expect(claimed).toBe(0);
    expect(transport.calls("buyShop")).toHaveLength(0);
  });

  it("skips challenge rewards when no claim date is reported", async () => {
    const transport = new FakeTransport({
      getReferralsInfo: () => ({ claimAvailible: false }),
      claimChallengesRewards: () => ({ rewards: [] }),
      getShop: () => ({ shop: [] }),
    });
    const state = makeState({
      meta: { isNextDailyRewardAvailable: false, nextDailyRewardAt: 0, freeGachaNextClaim: 0, nextChallengeClaimDate: 0 },
    });

    expect(await collectRewards(clientFor(transport), state, silentLogger)).toBe(0);
    expect(transport.calls("claimChallengesRewards")).toHaveLength(0);
  });
});
