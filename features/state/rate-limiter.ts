/**
 * Per-key minimum interval between user-visible notices.
 */
export class RateLimiter {
  private lastAt = new Map<string, number>();

  constructor(
    private readonly intervalMs: number,
    private readonly clock: () => number = () => Date.now(),
  ) {}

  /** True (and the key is stamped) when the interval has passed since the last pass. */
  tryAcquire(key = "default"): boolean {
    const now = this.clock();
    const last = this.lastAt.get(key);
    if (last !== undefined && now - last <= this.intervalMs) return false;
    this.lastAt.set(key, now);
    return true;
  }

  reset(key?: string): void {
    if (key === undefined) {
      this.lastAt.clear();
    } else {
      this.lastAt.delete(key);
    }
  }
}
