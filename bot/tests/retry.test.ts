import { describe, it, expect } from "vitest";
import { createRetryPolicy, withRetry } from "../src/api/retry.js";
import { GameLogicError, NetworkError, RetryExhaustedError } from "../src/errors.js";
import { instantRetry } from "./helpers/fakes.js";

describe("withRetry", () => {
  it("makes exactly maxAttempts attempts against a failing endpoint", async () => {
    const policy = instantRetry(3);
    let attempts = 0;
    const failing = async () => {
      attempts++;
      throw new NetworkError("getUserData", "timeout");
    };

    await expect(withRetry(policy, "getUserData", failing)).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(attempts).toBe(3);
    expect(policy.waits).toEqual([1000, 2000]);
  });

  it("returns the first successful result", async () => {
    const policy = instantRetry(3);
    let attempts = 0;
    const flaky = async () => {
      attempts++;
      if (attempts < 2) throw new NetworkError("getShop", "502");
      return "ok";
    };

    await expect(withRetry(policy, "getShop", flaky)).resolves.toBe("ok");
    expect(attempts).toBe(2);
  });

  it("never retries a game refusal", async () => {
    const policy = instantRetry(3);
    let attempts = 0;
    const refused = async () => {
      attempts++;
      throw new GameLogicError("levelUpHero", "error_level_up_no_resources", 400);
    };

    await expect(withRetry(policy, "levelUpHero", refused)).rejects.toBeInstanceOf(GameLogicError);
    expect(attempts).toBe(1);
  });

  it("stops retrying once shutdown is requested", async () => {
    const policy = instantRetry(3);
    const controller = new AbortController();
    let attempts = 0;
    const failing = async () => {
      attempts++;
      controller.abort();
      throw new NetworkError("getUserData", "socket hang up");
    };

    const error = await withRetry(policy, "getUserData", failing, { signal: controller.signal }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).not.toBeInstanceOf(RetryExhaustedError);
    expect(attempts).toBe(1);
  });

  it("reports each retry before waiting", async () => {
    const policy = instantRetry(2);
    const seen: Array<[number, number]> = [];
    await withRetry(policy, "getShop", async () => {
      throw new NetworkError("getShop", "timeout");
    }, { onRetry: (attempt, _error, waitMs) => seen.push([attempt, waitMs]) }).catch(() => undefined);
    expect(seen).toEqual([[1, 1000]]);
  });
});

describe("createRetryPolicy", () => {
  it("keeps the jittered backoff inside the action delay bounds", () => {
    const low = createRetryPolicy({ requestRetries: 3, actionDelay: [2, 5] }, () => 0);
    const high = createRetryPolicy({ requestRetries: 3, actionDelay: [2, 5] }, () => 1);

    expect(low.maxAttempts).toBe(3);
    expect(low.backoffMs(1)).toBe(2000);
    expect(low.backoffMs(2)).toBe(4000);
    expect(low.backoffMs(3)).toBe(5000);
    expect(high.backoffMs(1)).toBe(5000);
  });
});
