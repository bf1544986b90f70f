import { beforeEach, describe, expect, it, vi } from "vitest";
import { logger } from "../config/logger.js";
import { InMemoryKeyValueStore } from "../store/in-memory-key-value-store.js";
import { UnavailableKeyValueStore } from "../test/unavailable-store.js";
import { RateLimitExceededError } from "./errors.js";
import { IpRateLimiter, parseRate } from "./ip-rate-limiter.js";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const IP = "203.0.113.7";

describe("IpRateLimiter", () => {
  let clock: number;
  let store: InMemoryKeyValueStore;
  let limiter: IpRateLimiter;

  beforeEach(() => {
    vi.mocked(logger.warn).mockClear();
    clock = 1_700_000_000_000;
    store = new InMemoryKeyValueStore(() => clock);
    limiter = new IpRateLimiter(store);
  });

  it("allows 15 logins a minute and rejects the 16th with the time left in the window", async () => {
    for (let i = 1; i <= 15; i++) {
      clock += 1000;
      await expect(limiter.allow(IP, "login", 15, "minute")).resolves.toBe(true);
    }

    clock += 1000;
    const err = await limiter.allow(IP, "login", 15, "minute").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RateLimitExceededError);
    expect(err).toMatchObject({ retryAfter: 45, limit: 15, period: "minute", status: 429 });
  });

  it("reports a retryAfter no longer than the window", async () => {
    await limiter.allow(IP, "login", 1, "minute");
    await expect(limiter.allow(IP, "login", 1, "minute")).rejects.toMatchObject({ retryAfter: 60 });
  });

  it("arms the window expiry on the first request only", async () => {
    await limiter.allow(IP, "login", 15, "minute");
    clock += 20_000;
    await limiter.allow(IP, "login", 15, "minute");
    expect(await store.ttl(`rate-limit:${IP}:login`)).toBe(40);
  });

  it("starts a fresh window once the old one expires", async () => {
    await limiter.allow(IP, "login", 1, "minute");
    await expect(limiter.allow(IP, "login", 1, "minute")).rejects.toBeInstanceOf(RateLimitExceededError);

    clock += 60_000;
    await expect(limiter.allow(IP, "login", 1, "minute")).resolves.toBe(true);
  });

  it("counts each IP and route separately", async () => {
    await limiter.allow(IP, "login", 1, "minute");
    await expect(limiter.allow("198.51.100.1", "login", 1, "minute")).resolves.toBe(true);
    await expect(limiter.allow(IP, "register", 1, "minute")).resolves.toBe(true);
  });

  it("re-arms a counter that lost its expiry and reports the full period", async () => {
    const key = `rate-limit:${IP}:login`;
    await store.set(key, "15");

    await expect(limiter.allow(IP, "login", 15, "hour")).rejects.toMatchObject({ retryAfter: 3600 });
    expect(await store.ttl(key)).toBe(3600);
  });

  it("uses the configured key prefix", async () => {
    await new IpRateLimiter(store, "rl").allow(IP, "login", 5, "second");
    expect(await store.get(`rl:${IP}:login`)).toBe("1");
    expect(await store.ttl(`rl:${IP}:login`)).toBe(1);
  });

  it("rejects an unknown period before touching the store", async () => {
    await expect(limiter.allow(IP, "login", 5, "fortnight")).rejects.toThrow("Invalid rate limit period: fortnight");
    expect(store.size).toBe(0);
  });

  it("accepts a parsed rate", async () => {
    await expect(limiter.allowRate(IP, "login", parseRate("1 per day"))).resolves.toBe(true);
    await expect(limiter.allowRate(IP, "login", parseRate("1 per day"))).rejects.toMatchObject({
      retryAfter: 86400,
      period: "day",
    });
  });

  it("allows the request and logs when the store is unavailable", async () => {
    const failOpen = new IpRateLimiter(new UnavailableKeyValueStore());

    for (let i = 0; i < 20; i++) {
      await expect(failOpen.allow(IP, "login", 1, "minute")).resolves.toBe(true);
    }
    expect(logger.warn).toHaveBeenCalledWith("Rate limit store unavailable; allowing request", {
      routeKey: "login",
      error: "Key-value store unavailable during incr",
    });
  });
});
