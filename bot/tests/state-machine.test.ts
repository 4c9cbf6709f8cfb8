import { describe, it, expect } from "vitest";
import { InvalidTransitionError, canTransition, transition } from "../src/game/state-machine.js";

describe("runner state machine", () => {
  it("follows the authenticate, cycle, sleep loop", () => {
    expect(transition("idle", "authenticated")).toBe("authenticated");
    expect(transition("authenticated", "cycling")).toBe("cycling");
    expect(transition("cycling", "sleeping")).toBe("sleeping");
    expect(transition("sleeping", "cycling")).toBe("cycling");
    expect(canTransition("cycling", "authenticated")).toBe(true);
  });

  it("rejects skipped or terminal transitions", () => {
    expect(canTransition("idle", "cycling")).toBe(false);
    expect(() => transition("stopped", "idle")).toThrow(InvalidTransitionError);
    expect(() => transition("idle", "sleeping")).toThrow("idle → sleeping");
  });
});
