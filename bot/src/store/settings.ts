import { FARMING_HEROES, RESOURCE_TYPES } from "../constants/game.js";
import { ConfigError } from "../errors.js";
import { normalizeProxy } from "../proxy/agent.js";
import type { FarmingHero, ResourceType, SessionConfig } from "../types.js";
import { validateSessionConfig } from "./sessions.js";

const BOOLEAN_KEYS = ["constellationAutoAdvance", "buyGachaPacks", "spendGachas", "processMissions", "upgradeCards"] as const;
type BooleanKey = (typeof BOOLEAN_KEYS)[number];

function isBooleanKey(key: string): key is BooleanKey {
  return BOOLEAN_KEYS.some((k) => k === key);
}

function isResource(value: string): value is ResourceType {
  return RESOURCE_TYPES.some((r) => r === value);
}

function isHero(value: string): value is FarmingHero {
  return FARMING_HEROES.some((h) => h === value);
}

function parseBool(key: string, raw: string): boolean {
  switch (raw.toLowerCase()) {
    case "true":
    case "on":
    case "yes":
    case "1":
      return true;
    case "false":
    case "off":
    case "no":
    case "0":
      return false;
    default:
      throw new ConfigError(`expected on/off, got "${raw}"`, key);
  }
}

function parseCount(key: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) throw new ConfigError(`expected a non-negative integer, got "${raw}"`, key);
  return value;
}

function isNone(raw: string): boolean {
  return ["", "none", "null", "auto"].includes(raw.toLowerCase());
}

/**
 * Apply one `key=value` edit and return the validated result. Keys:
 * `farm.<resource>`, `priorities.<hero>.<resource>`, `gemsSafeBalance`,
 * `constellationLastIndex` ("none" clears the override), `proxy`
 * ("none" clears it) and the boolean toggles.
 */
export function applySetting(config: SessionConfig, key: string, rawValue: string): SessionConfig {
  const raw = rawValue.trim();
  const next: SessionConfig = {
    ...config,
    farm: { ...config.farm },
    priorities: { bonk: { ...config.priorities.bonk }, dragon: { ...config.priorities.dragon } },
  };
  const parts = key.split(".");
  const [head, first = "", second = ""] = parts;

  if (head === "farm" && parts.length === 2 && isResource(first)) {
    next.farm[first] = parseBool(key, raw);
  } else if (head === "priorities" && parts.length === 3 && isHero(first) && isResource(second)) {
    next.priorities[first][second] = parseCount(key, raw);
  } else if (key === "gemsSafeBalance") {
    next.gemsSafeBalance = parseCount(key, raw);
  } else if (key === "constellationLastIndex") {
    next.constellationLastIndex = isNone(raw) ? null : parseCount(key, raw);
  } else if (key === "proxy") {
    if (isNone(raw)) {
      next.proxy = null;
    } else {
      const proxy = normalizeProxy(raw);
      if (!proxy) throw new ConfigError(`unsupported proxy "${raw}"`, key);
      next.proxy = proxy;
    }
  } else if (isBooleanKey(key)) {
    next[key] = parseBool(key, raw);
  } else {
    throw new ConfigError(`unknown setting`, key);
  }

  return validateSessionConfig(next);
}

export function formatSettings(config: SessionConfig): string[] {
  const onOff = (v: boolean) => (v ? "on" : "off");
  const lines = [
    `Session:              ${config.sessionName}`,
    `Farm:                 ${RESOURCE_TYPES.map((r) => `${r}=${onOff(config.farm[r])}`).join(" ")}`,
  ];
  for (const hero of FARMING_HEROES) {
    const ranks = RESOURCE_TYPES.map((r) => `${r}=${config.priorities[hero][r]}`).join(" ");
    lines.push(`Priorities (${hero}):`.padEnd(22) + ranks);
  }
  lines.push(
    `Constellation:        ${config.constellationLastIndex ?? "auto"}` +
      (config.constellationLastIndex !== null && config.constellationAutoAdvance ? " (auto-advance)" : ""),
    `Tracked constellation: ${config.trackedConstellationIndex ?? "-"}`,
    `Gems safe balance:    ${config.gemsSafeBalance}`,
    `Buy gacha packs:      ${onOff(config.buyGachaPacks)}`,
    `Spend gachas:         ${onOff(config.spendGachas)}`,
    `Process missions:     ${onOff(config.processMissions)}`,
    `Upgrade cards:        ${onOff(config.upgradeCards)}`,
    `Proxy:                ${config.proxy ?? "-"}`,
    `User agent:           ${config.userAgent}`
  );
  return lines;
}
