import { describe, it, expect } from "vitest";
import { loadConfig, requireTelegramCredentials } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config.sessionStartDelay).toBe(360);
    expect(config.actionDelay).toEqual([2, 5]);
    expect(config.sleepTime).toEqual([600, 3600]);
    expect(config.requestRetries).toBe(3);
    expect(config.requestTimeoutMs).toBe(60_000);
    expect(config.sessionsPerProxy).toBe(1);
    expect(config.useProxy).toBe(true);
    expect(config.disableProxyReplace).toBe(false);
    expect(config.logFormat).toBe("pretty");
    expect(config.dashboardPort).toBe(0);
    expect(config.apiId).toBeNull();
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("reads ranges, booleans and lists", () => {
    const config = loadConfig({
      API_ID: "12345",
      API_HASH: "test-secret",
      ACTION_DELAY: "[1, 3]",
      SLEEP_TIME: "100,200",
      USE_PROXY: "False",
      BLACKLISTED_SESSIONS: "one, two,,",
      LOG_FORMAT: "json",
    });
    expect(config.actionDelay).toEqual([1, 3]);
    expect(config.sleepTime).toEqual([100, 200]);
    expect(config.useProxy).toBe(false);
    expect(config.blacklistedSessions).toEqual(["one", "two"]);
    expect(config.logFormat).toBe("json");
    expect(requireTelegramCredentials(config)).toEqual({ apiId: 12345, apiHash: "test-secret" });
  });

  it("rejects malformed values with the offending key", () => {
    expect(() => loadConfig({ REQUEST_RETRIES: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ SLEEP_TIME: "50,10" })).toThrow("SLEEP_TIME");
    expect(() => loadConfig({ USE_PROXY: "maybe" })).toThrow("USE_PROXY");
    expect(() => loadConfig({ LOG_FORMAT: "xml" })).toThrow("LOG_FORMAT");
  });

  it("requires Telegram credentials only to run sessions", () => {
    expect(() => requireTelegramCredentials(loadConfig({}))).toThrow(ConfigError);
  });
});
