import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { LinkError, fail, ok, type Result } from "@/features/errors";
import { AutoReconnector, type ReconnectEvent, type ReconnectTarget } from "../auto-reconnect";
import { nextBackoffDelay } from "../backoff";

class StubTarget implements ReconnectTarget {
  connected = false;
  manual = false;
  calls = 0;
  /** Outcomes for successive reconnect() calls; the last one repeats. */
  outcomes: boolean[] = [false];

  isConnected(): boolean {
    return this.connected;
  }

  isManualDisconnect(): boolean {
    return this.manual;
  }

  async reconnect(): Promise<Result<void>> {
    const outcome = this.outcomes[Math.min(this.calls, this.outcomes.length - 1)];
    this.calls++;
    if (outcome) {
      this.connected = true;
      return ok(undefined);
    }
    return fail(new LinkError("PeerNotFound", "Sensor not found (not paired)"));
  }
}

describe("nextBackoffDelay", () => {
  it("is zero before the first failure", () => {
    expect(nextBackoffDelay(0)).toBe(0);
  });

  it("doubles from 3 s and caps at 30 s", () => {
    expect([1, 2, 3, 4, 5, 6, 10].map((n) => nextBackoffDelay(n))).toEqual([
      3000, 6000, 12000, 24000, 30000, 30000, 30000,
    ]);
  });

  it("takes a custom base and cap", () => {
    expect(nextBackoffDelay(3, 100, 250)).toBe(250);
    expect(nextBackoffDelay(2, 100, 250)).toBe(200);
  });
});

describe("AutoReconnector", () => {
  let target: StubTarget;
  let reconnector: AutoReconnector;
  let events: ReconnectEvent[];

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    target = new StubTarget();
    reconnector = new AutoReconnector(target);
    events = [];
    reconnector.addEventListener((e) => events.push(e));
  });

  afterEach(() => {
    reconnector.stop();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  const delays = () =>
    events.flatMap((e) => (e.type === "attemptFailed" ? [e.nextDelayMs] : []));

  it("makes the first attempt immediately", async () => {
    expect(reconnector.start()).toBe(true);
    await vi.advanceTimersByTimeAsync(0);
    expect(target.calls).toBe(1);
  });

  it("backs off exponentially between failed attempts", async () => {
    reconnector.start();
    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(3000);
    await vi.advanceTimersByTimeAsync(6000);
    await vi.advanceTimersByTimeAsync(12000);
    await vi.advanceTimersByTimeAsync(24000);
    await vi.advanceTimersByTimeAsync(30000);

    expect(target.calls).toBe(6);
    expect(delays()).toEqual([3000, 6000, 12000, 24000, 30000, 30000]);
  });

  it("does not attempt before the delay has elapsed", async () => {
    reconnector.start();
    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(2999);
    expect(target.calls).toBe(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(target.calls).toBe(2);
  });

  it("ends once an attempt succeeds", async () => {
    target.outcomes = [false, false, true];
    reconnector.start();
    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(3000);
    await vi.advanceTimersByTimeAsync(6000);

    expect(events[events.length - 1]).toEqual({ type: "succeeded", attempts: 3 });
    expect(reconnector.isRunning).toBe(false);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(target.calls).toBe(3);
  });

  it("keeps a single task in flight", async () => {
    expect(reconnector.start()).toBe(true);
    expect(reconnector.start()).toBe(false);
    await vi.advanceTimersByTimeAsync(0);
    expect(target.calls).toBe(1);
  });

  it("does not start after a manual disconnect or while connected", () => {
    target.manual = true;
    expect(reconnector.start()).toBe(false);
    target.manual = false;
    target.connected = true;
    expect(reconnector.start()).toBe(false);
  });

  it("stops when the user disconnects between attempts", async () => {
    reconnector.start();
    await vi.advanceTimersByTimeAsync(0);
    target.manual = true;
    await vi.advanceTimersByTimeAsync(3000);

    expect(target.calls).toBe(1);
    expect(reconnector.isRunning).toBe(false);
    expect(events[events.length - 1]).toEqual({ type: "stopped" });
  });

  it("cancels the pending attempt on stop()", async () => {
    reconnector.start();
    await vi.advanceTimersByTimeAsync(0);
    reconnector.stop();
    await vi.advanceTimersByTimeAsync(60_000);
    expect(target.calls).toBe(1);
  });

  it("restarts the backoff from the beginning on a new start", async () => {
    reconnector.start();
    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(3000);
    reconnector.stop();
    events.length = 0;

    reconnector.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(delays()).toEqual([3000]);
  });
});
