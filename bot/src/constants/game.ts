export const API_BASE_URL = "https://telegram-api.sleepagotchi.com/v1/tg";
export const WEBAPP_ORIGIN = "https://tgcf.sleepagotchi.com";
export const GAME_BOT_USERNAME = "sleepagotchiLITE_bot";
export const GAME_APP_SHORT_NAME = "game";
export const DEFAULT_REF_ID = "72633a323238363138373939";

// Enumeration order doubles as the priority tie-break order
export const RESOURCE_TYPES = ["greenStones", "purpleStones", "gold", "gacha", "points"] as const;

export const FARMING_HEROES = ["bonk", "dragon"] as const;

export const FARMING_HERO_TYPES = {
  bonk: "bonk",
  dragon: "dragonEpic",
} as const;

export const CONSTELLATION_PAGE_SIZE = 10;
export const DEFAULT_GACHA_GEM_COST = 500;
export const BULK_PACK_SIZE = 10;
export const SPECIAL_HERO_MAX_LEVEL = 50;
export const MAX_ACTIONS_PER_PASS = 60;

export const MAINTENANCE_SLEEP_SECONDS: readonly [number, number] = [300, 600];
export const ERROR_SLEEP_SECONDS: readonly [number, number] = [60, 120];
export const NO_PROXY_SLEEP_SECONDS = 300;
/** How long a mission the game refused to pay out is left alone. */
export const REFUSED_MISSION_COOLDOWN_SECONDS = 6 * 3600;

/** Game error codes that are expected during normal play and logged at debug. */
export const SILENT_ERROR_CODES = [
  "error_level_up_unavalable",
  "error_level_up_no_resources",
  "error_level_up_max_level",
  "error_star_up_no_resources",
  "error_star_up_card_on_challenge",
  "error_challenge_in_progress",
] as const;
