import { describe, it, expect } from "vitest";
import {
  parseConstellations,
  parseReferralsClaimable,
  parseRewards,
  parseShop,
  parseUserData,
} from "../src/api/parse.js";

describe("parseUserData", () => {
  const raw = {
    player: {
      resources: {
        gem: { amount: 1200 },
        gold: { amount: 50 },
        greenStones: { amount: 7 },
        gacha: { amount: 2 },
        heroCard: [
          { heroType: "bonk", amount: 3 },
          { heroType: "mageRare", amount: 0 },
        ],
      },
      heroes: [{ heroType: "bonk", name: "Bonk", class: "universal", level: 12, stars: 2, power: 340, costStar: 10 }],
      meta: { isNextDailyRewardAvailable: true, freeGachaNextClaim: 1000, constellationsLastIndex: 4 },
    },
  };

  it("reads balances, cards and heroes", () => {
    const player = parseUserData(raw);
    expect(player.resources).toEqual({ gem: 1200, gold: 50, greenStones: 7, purpleStones: 0, gacha: 2, points: 0 });
    expect(player.heroCards).toEqual({ bonk: 3 });
    expect(player.heroes).toEqual([
      {
        heroType: "bonk",
        name: "Bonk",
        heroClass: "universal",
        level: 12,
        stars: 2,
        power: 340,
        unlockAt: 0,
        costLevelGold: 0,
        costLevelGreen: 0,
        costStar: 10,
      },
    ]);
  });

  it("defaults the pack cost and reads the reported constellation", () => {
    const player = parseUserData(raw);
    expect(player.costs.gachaGemCost).toBe(500);
    expect(player.reportedConstellationIndex).toBe(4);
    expect(player.meta.isNextDailyRewardAvailable).toBe(true);
    expect(player.meta.freeGachaNextClaim).toBe(1000);
  });

  it("tolerates an empty body", () => {
    const player = parseUserData({});
    expect(player.heroes).toEqual([]);
    expect(player.reportedConstellationIndex).toBeNull();
  });
});

describe("parseConstellations", () => {
  it("numbers constellations from the requested start and orders slots", () => {
    const [first, second] = parseConstellations(
      {
        constellations: [
          {
            name: "Aries",
            challenges: [
              {
                challengeType: "aries1",
                resourceType: "gold",
                value: 100,
                received: 40,
                time: 7200,
                orderedSlots: [
                  { heroClass: "warrior", occupiedBy: "bonk" },
                  { heroClass: "mage", unlocked: false },
                ],
              },
            ],
          },
          { name: "Taurus", challenges: [] },
        ],
      },
      5
    );

    expect(first.index).toBe(5);
    expect(second.index).toBe(6);
    expect(first.challenges[0].time).toBe(7200);
    expect(first.challenges[0].minStars).toBe(1);
    expect(first.challenges[0].slots).toEqual([
      { slotId: 0, heroClass: "warrior", unlocked: true, unlockAt: 0, occupiedBy: "bonk" },
      { slotId: 1, heroClass: "mage", unlocked: false, unlockAt: 0, occupiedBy: "empty" },
    ]);
  });
});

describe("parseRewards", () => {
  it("reads reward arrays", () => {
    expect(parseRewards({ rewards: [{ type: "gold", amount: 30 }] })).toEqual([{ name: "gold", type: "gold", amount: 30 }]);
  });

  it("reads reward maps", () => {
    expect(parseRewards({ gem: { amount: 5 }, ok: true })).toEqual([{ name: "gem", type: "gem", amount: 5 }]);
  });
});

describe("parseShop", () => {
  it("marks slots without a claim time as not claimable", () => {
    expect(parseShop({ shop: [{ slotType: "free", nextClaimAt: 10 }, { slotType: "paid" }] })).toEqual([
      { slotType: "free", nextClaimAt: 10, content: [] },
      { slotType: "paid", nextClaimAt: Number.MAX_SAFE_INTEGER, content: [] },
    ]);
  });
});

describe("parseReferralsClaimable", () => {
  it("accepts either spelling of the flag", () => {
    expect(parseReferralsClaimable({ claimAvailible: true })).toBe(true);
    expect(parseReferralsClaimable({ claimAvailable: true })).toBe(true);
    expect(parseReferralsClaimable({})).toBe(false);
  });
});
