export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Wait `ms` milliseconds. Resolves early (never rejects) when the signal
 * aborts, so callers check `signal.aborted` afterwards.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted || ms <= 0) return Promise.resolve();
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  const parts: string[] = [];
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (seconds > 0) parts.push(`${seconds}s`);
  return parts.length > 0 ? parts.join(" ") : "0s";
}

/** "HH:MM:SS (in 1h 2m)" style label for a future timestamp. */
export function formatNextTime(nextMs: number, now: number = Date.now()): string {
  if (nextMs === 0 || nextMs <= now) return "now";
  const clock = new Date(nextMs).toISOString().slice(11, 19);
  return `${clock} (in ${formatDuration(nextMs - now)})`;
}
