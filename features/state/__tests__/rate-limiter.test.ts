import { describe, it, expect } from "vitest";
import { RateLimiter } from "../rate-limiter";

describe("RateLimiter", () => {
  it("lets one call per key through within the interval", () => {
    let now = 0;
    const limiter = new RateLimiter(10_000, () => now);

    expect(limiter.tryAcquire("offline")).toBe(true);
    now = 5_000;
    expect(limiter.tryAcquire("offline")).toBe(false);
    expect(limiter.tryAcquire("lost")).toBe(true);
    now = 10_001;
    expect(limiter.tryAcquire("offline")).toBe(true);
  });

  it("blocks a call exactly at the interval boundary", () => {
    let now = 0;
    const limiter = new RateLimiter(10_000, () => now);
    limiter.tryAcquire();
    now = 10_000;
    expect(limiter.tryAcquire()).toBe(false);
  });

  it("forgets a key on reset", () => {
    const limiter = new RateLimiter(10_000, () => 0);
    limiter.tryAcquire("a");
    limiter.tryAcquire("b");
    limiter.reset("a");
    expect(limiter.tryAcquire("a")).toBe(true);
    expect(limiter.tryAcquire("b")).toBe(false);
    limiter.reset();
    expect(limiter.tryAcquire("b")).toBe(true);
  });
});
