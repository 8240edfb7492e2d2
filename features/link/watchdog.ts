/**
 * Stale-data watchdog.
 *
 * Checks once per interval whether the link has gone silent while it is
 * supposed to be streaming. Fires at most once per silent stretch: a new
 * reading (a different activity timestamp) re-arms it.
 */

import { Config } from "@/constants/timing";

const TAG = "[Watchdog]";

export interface WatchdogOptions {
  /** True while readings are expected (connected, session active, not a manual disconnect). */
  isArmed: () => boolean;
  /** Timestamp of the last reading, or of the connection when none arrived yet. */
  lastActivityAt: () => number | null;
  onStale: (silentForMs: number) => void;
  intervalMs?: number;
  timeoutMs?: number;
  clock?: () => number;
}

export class StaleDataWatchdog {
  private readonly intervalMs: number;
  private readonly timeoutMs: number;
  private readonly clock: () => number;
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private firedFor: number | null = null;

  constructor(private readonly options: WatchdogOptions) {
    this.intervalMs = options.intervalMs ?? Config.WATCHDOG_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs ?? Config.STALE_DATA_TIMEOUT_MS;
    this.clock = options.clock ?? (() => Date.now());
  }

  get isRunning(): boolean {
    return this.intervalId !== null;
  }

  start(): void {
    if (this.intervalId) return;
    this.intervalId = setInterval(() => this.check(), this.intervalMs);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    this.firedFor = null;
  }

  /** Returns true when the stale handler fired. */
  check(): boolean {
    if (!this.options.isArmed()) return false;
    const last = this.options.lastActivityAt();
    if (last === null || last === this.firedFor) return false;

    const silentFor = this.clock() - last;
    if (silentFor < this.timeoutMs) return false;

    this.firedFor = last;
    console.warn(`${TAG} No data for ${silentFor}ms`);
    this.options.onStale(silentFor);
    return true;
  }
}
