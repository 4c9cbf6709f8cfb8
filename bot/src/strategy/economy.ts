import { BULK_PACK_SIZE } from "../constants/game.js";

/**
 * Number of gacha packs to buy with gems without dropping below the safe
 * balance: a bulk pack when it fits, a single one otherwise, else 0.
 */
export function packPurchaseAmount(gems: number, packCost: number, safeBalance: number): number {
  if (packCost <= 0) return 0;
  if (gems - BULK_PACK_SIZE * packCost >= safeBalance) return BULK_PACK_SIZE;
  if (gems - packCost >= safeBalance) return 1;
  return 0;
}
