import type { Constellation, SessionConfig } from "../types.js";

/**
 * Starting constellation for this cycle. A manual override always wins, then
 * the index the game reports, then the runner's own record.
 */
export function resolveConstellationIndex(
  config: Pick<SessionConfig, "constellationLastIndex" | "trackedConstellationIndex">,
  reportedIndex: number | null
): number {
  if (config.constellationLastIndex !== null) return config.constellationLastIndex;
  if (reportedIndex !== null) return reportedIndex;
  return config.trackedConstellationIndex ?? 0;
}

export function isConstellationComplete(constellation: Constellation): boolean {
  return (
    constellation.challenges.length > 0 &&
    constellation.challenges.every((c) => c.received >= c.value)
  );
}

/**
 * Config fields to persist once the constellation at `startIndex` is fully
 * complete, or null when nothing changes. A pinned override is left alone.
 */
export function constellationAdvance(
  config: Pick<SessionConfig, "constellationLastIndex" | "constellationAutoAdvance" | "trackedConstellationIndex">,
  constellations: Constellation[],
  startIndex: number
): Partial<Pick<SessionConfig, "constellationLastIndex" | "trackedConstellationIndex">> | null {
  const current = constellations.find((c) => c.index === startIndex);
  if (!current || !isConstellationComplete(current)) return null;

  const next = startIndex + 1;
  if (config.constellationLastIndex !== null) {
    return config.constellationAutoAdvance ? { constellationLastIndex: next } : null;
  }
  if (config.trackedConstellationIndex === next) return null;
  return { trackedConstellationIndex: next };
}
