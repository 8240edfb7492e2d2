/**
 * Auto-reconnect task.
 *
 * At most one task is in flight. The first attempt runs immediately; each
 * failure schedules the next one with exponential backoff. The task ends on
 * success, on a manual disconnect, when the link is already up, or on stop().
 */

import type { ErrorInfo, Result } from "@/features/errors";
import { EventHub, type EventListener, type Unsubscribe } from "@/features/state/event-hub";
import { nextBackoffDelay } from "./backoff";

const TAG = "[Reconnect]";

export interface ReconnectTarget {
  isConnected(): boolean;
  isManualDisconnect(): boolean;
  reconnect(): Promise<Result<void>>;
}

export type ReconnectEvent =
  | { type: "attemptStarted"; attempt: number }
  | { type: "attemptFailed"; attempt: number; nextDelayMs: number; error: ErrorInfo }
  | { type: "succeeded"; attempts: number }
  | { type: "stopped" };

export interface AutoReconnectOptions {
  baseDelayMs?: number;
  maxDelayMs?: number;
  clock?: () => number;
}

export class AutoReconnector {
  private readonly events = new EventHub<ReconnectEvent>(TAG);
  private readonly baseDelayMs?: number;
  private readonly maxDelayMs?: number;
  private readonly clock: () => number;

  private running = false;
  private failures = 0;
  private attempts = 0;
  private timeoutId: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly target: ReconnectTarget,
    options: AutoReconnectOptions = {},
  ) {
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.clock = options.clock ?? (() => Date.now());
  }

  get isRunning(): boolean {
    return this.running;
  }

  addEventListener(listener: EventListener<ReconnectEvent>): Unsubscribe {
    return this.events.subscribe(listener);
  }

  /**
   * Returns false when a task is already running or there is nothing to do.
   */
  start(): boolean {
    if (this.running) return false;
    if (this.target.isManualDisconnect() || this.target.isConnected()) return false;

    this.running = true;
    this.failures = 0;
    this.attempts = 0;
    this.log("Starting auto-reconnect");
    this.schedule(0);
    return true;
  }

  stop(): void {
    if (this.timeoutId) {
      clearTimeout(this.timeoutId);
      this.timeoutId = null;
    }
    if (!this.running) return;
    this.running = false;
    this.failures = 0;
    this.log("Auto-reconnect stopped");
    this.events.emit({ type: "stopped" });
  }

  private schedule(delayMs: number): void {
    this.timeoutId = setTimeout(() => {
      this.timeoutId = null;
      this.attempt().catch((err: unknown) => {
        console.error(`${TAG} Attempt crashed:`, err);
        this.stop();
      });
    }, delayMs);
  }

  private async attempt(): Promise<void> {
    if (!this.running) return;
    if (this.target.isManualDisconnect() || this.target.isConnected()) {
      this.stop();
      return;
    }

    const attempt = ++this.attempts;
    this.log(`Attempt ${attempt}`);
    this.events.emit({ type: "attemptStarted", attempt });

    const result = await this.target.reconnect();
    if (!this.running) return;

    if (result.ok) {
      this.running = false;
      this.failures = 0;
      this.log(`Reconnected after ${attempt} attempt(s)`);
      this.events.emit({ type: "succeeded", attempts: attempt });
      return;
    }

    this.failures++;
    const delay = nextBackoffDelay(this.failures, this.baseDelayMs, this.maxDelayMs);
    this.log(`Attempt ${attempt} failed (${result.error.message}), retrying in ${delay}ms`);
    this.events.emit({
      type: "attemptFailed",
      attempt,
      nextDelayMs: delay,
      error: result.error.toInfo(this.clock()),
    });
    this.schedule(delay);
  }

  private log(message: string): void {
    console.log(`${TAG} ${message}`);
  }
}
