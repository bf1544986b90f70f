import { beforeEach, describe, expect, it, vi } from "vitest";
import { logger } from "../config/logger.js";
import { InMemoryKeyValueStore } from "../store/in-memory-key-value-store.js";
import type { IKeyValueStore } from "../store/key-value-store.js";
import { UnavailableKeyValueStore } from "../test/unavailable-store.js";
import { LoginAttemptTracker, normalizeIdentity } from "./login-attempt-tracker.js";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const IDENTITY = "alice@example.com";

describe("LoginAttemptTracker", () => {
  let clock: number;
  let store: InMemoryKeyValueStore;
  let tracker: LoginAttemptTracker;

  beforeEach(() => {
    vi.mocked(logger.warn).mockClear();
    clock = 1_700_000_000_000;
    store = new InMemoryKeyValueStore(() => clock);
    tracker = new LoginAttemptTracker(store, { maxFailedAttempts: 5, lockoutPeriodSeconds: 900, now: () => clock });
  });

  async function fail(times: number, identity = IDENTITY): Promise<void> {
    for (let i = 0; i < times; i++) await tracker.recordFailure(identity);
  }

  it("reports unlocked for an identity with no history", async () => {
    expect(await tracker.checkLockout(IDENTITY)).toEqual({ locked: false, remainingSeconds: 0 });
  });

  it("stays unlocked below the failure limit", async () => {
    await fail(4);
    expect(await tracker.checkLockout(IDENTITY)).toEqual({ locked: false, remainingSeconds: 0 });
  });

  it("locks for the full period after the fifth failure", async () => {
    await fail(5);
    expect(await tracker.checkLockout(IDENTITY)).toEqual({ locked: true, remainingSeconds: 900 });
  });

  it("counts down from the most recent failure", async () => {
    await fail(5);
    clock += 300_500;
    expect(await tracker.checkLockout(IDENTITY)).toEqual({ locked: true, remainingSeconds: 600 });
  });

  it("measures the window from the latest failure, never beyond one period", async () => {
    await fail(5);
    clock += 100_000;
    await fail(1);
    expect(await tracker.checkLockout(IDENTITY)).toEqual({ locked: true, remainingSeconds: 900 });
    clock += 900_000;
    expect(await tracker.checkLockout(IDENTITY)).toEqual({ locked: false, remainingSeconds: 0 });
  });

  it("clears the record once the period has elapsed", async () => {
    await fail(5);
    clock += 900_000;

    expect(await tracker.checkLockout(IDENTITY)).toEqual({ locked: false, remainingSeconds: 0 });
    expect(await store.get("login:failed:alice@example.com")).toBeNull();
    expect(await store.get("login:failed:alice@example.com:timestamp")).toBeNull();

    await fail(1);
    expect(await store.get("login:failed:alice@example.com")).toBe("1");
  });

  it("unlocks immediately after a success", async () => {
    await fail(5);
    await tracker.recordSuccess(IDENTITY);
    expect(await tracker.checkLockout(IDENTITY)).toEqual({ locked: false, remainingSeconds: 0 });
    expect(store.size).toBe(0);
  });

  it("keeps counters for twice the lockout period", async () => {
    await fail(1);
    expect(await store.ttl("login:failed:alice@example.com")).toBe(1800);
    expect(await store.ttl("login:failed:alice@example.com:timestamp")).toBe(1800);
    expect(await store.get("login:failed:alice@example.com:timestamp")).toBe(String(clock));
  });

  it("treats identities case-insensitively", async () => {
    await fail(3, "Alice@Example.com");
    await fail(2, "  alice@example.com ");
    expect((await tracker.checkLockout("ALICE@EXAMPLE.COM")).locked).toBe(true);
  });

  it("keeps identities independent", async () => {
    await fail(5);
    expect((await tracker.checkLockout("bob@example.com")).locked).toBe(false);
  });

  it("reports unlocked when the count has no timestamp", async () => {
    for (let i = 0; i < 5; i++) await store.incr("login:failed:alice@example.com");
    expect(await tracker.checkLockout(IDENTITY)).toEqual({ locked: false, remainingSeconds: 0 });
  });

  it("logs each failure and the lock", async () => {
    await fail(5);
    expect(logger.warn).toHaveBeenCalledWith("Failed login attempt", { attempts: 5, max: 5 });
    expect(logger.warn).toHaveBeenCalledWith("Account locked after repeated failed logins", {
      attempts: 5,
      lockoutSeconds: 900,
    });
  });

  describe("when the store is unavailable", () => {
    it("fails open on every operation", async () => {
      const unavailable = new UnavailableKeyValueStore();
      const failOpen = new LoginAttemptTracker(unavailable);

      await expect(failOpen.recordFailure(IDENTITY)).resolves.toBeUndefined();
      await expect(failOpen.recordSuccess(IDENTITY)).resolves.toBeUndefined();
      expect(await failOpen.checkLockout(IDENTITY)).toEqual({ locked: false, remainingSeconds: 0 });

      expect(unavailable.calls).toBe(3);
      expect(logger.warn).toHaveBeenCalledWith("Login attempt store unavailable; lockout not enforced", {
        operation: "checkLockout",
        error: "Key-value store unavailable during get",
      });
    });

    it("propagates errors that are not store outages", async () => {
      class BrokenStore extends InMemoryKeyValueStore {
        override async get(): Promise<string | null> {
          throw new TypeError("bug");
        }
      }
      const broken: IKeyValueStore = new BrokenStore();
      await expect(new LoginAttemptTracker(broken).checkLockout(IDENTITY)).rejects.toThrow(TypeError);
    });
  });
});

describe("normalizeIdentity", () => {
  it("trims and lower-cases", () => {
    expect(normalizeIdentity("  Alice@Example.COM\t")).toBe("alice@example.com");
  });
});
