import { SPECIAL_HERO_MAX_LEVEL } from "../constants/game.js";
import type { GameState, Hero, HeroRarity } from "../types.js";

export function heroRarity(heroType: string): HeroRarity {
  if (heroType.endsWith("Legendary")) return "legendary";
  if (heroType.endsWith("Epic")) return "epic";
  if (heroType.endsWith("Rare")) return "rare";
  if (heroType === "bonk") return "special";
  if (heroType.includes("Element")) {
    if (heroType.endsWith("3")) return "legendary";
    if (heroType.endsWith("2")) return "epic";
  }
  return "rare";
}

/**
 * Strongest hero of every class/rarity group, by stars, then level, then
 * power. Only these are levelled so gold is not spread thin.
 */
export function bestHeroesByGroup(heroes: Hero[]): Set<string> {
  const best = new Map<string, Hero>();
  for (const hero of heroes) {
    const key = `${hero.heroClass}_${heroRarity(hero.heroType)}`;
    const current = best.get(key);
    if (
      !current ||
      hero.stars > current.stars ||
      (hero.stars === current.stars && hero.level > current.level) ||
      (hero.stars === current.stars && hero.level === current.level && hero.power > current.power)
    ) {
      best.set(key, hero);
    }
  }
  return new Set([...best.values()].map((h) => h.heroType));
}

export function pickStarUp(state: GameState, skip: ReadonlySet<string>): Hero | null {
  for (const hero of state.heroes) {
    if (hero.costStar <= 0) continue;
    if ((state.heroCards[hero.heroType] ?? 0) < hero.costStar) continue;
    if (skip.has(`star_up_hero:${hero.heroType}`)) continue;
    return hero;
  }
  return null;
}

export function pickLevelUp(state: GameState, skip: ReadonlySet<string>): Hero | null {
  const best = bestHeroesByGroup(state.heroes);
  const { gold, greenStones } = state.resources;

  for (const hero of state.heroes) {
    const rarity = heroRarity(hero.heroType);
    if (rarity === "epic" || rarity === "legendary") continue;
    if (rarity === "special" && hero.level >= SPECIAL_HERO_MAX_LEVEL) continue;
    if (!best.has(hero.heroType)) continue;
    if (hero.costLevelGold <= 0 || hero.costLevelGreen <= 0) continue;
    if (gold < hero.costLevelGold || greenStones < hero.costLevelGreen) continue;
    if (skip.has(`level_hero:${hero.heroType}`)) continue;
    return hero;
  }
  return null;
}
