export type RandomSource = () => number;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Uniform float in [min, max]. */
export function randomBetween(min: number, max: number, random: RandomSource = Math.random): number {
  return min + (max - min) * random();
}

export function randomRange(range: readonly [number, number], random: RandomSource = Math.random): number {
  return randomBetween(range[0], range[1], random);
}

export function shuffle<T>(items: T[], random: RandomSource = Math.random): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
