import type { RandomSource } from "../utils/math.js";

const MIN_CHROME = 110;
const MAX_CHROME = 131;

/** Desktop Chrome on macOS, major version picked in [110, 131]. */
export function randomUserAgent(random: RandomSource = Math.random): string {
  const major = MIN_CHROME + Math.floor(random() * (MAX_CHROME - MIN_CHROME + 1));
  return (
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 " +
    `(KHTML, like Gecko) Chrome/${major}.0.0.0 Safari/537.36`
  );
}
