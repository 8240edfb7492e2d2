/**
 * Session accounting engine.
 *
 * Tracks how long the user has been seated with the sensor connected,
 * excluding paused intervals, and runs the bad-posture alert timer and the
 * one-shot break reminder.
 *
 * Phases: inactive → running ⇄ paused → (finalize) → inactive.
 * Time spent running is folded into `accumulatedMs` each time the session
 * leaves the running phase, so the effective duration is
 * `accumulatedMs + (now − segmentStartedAt)` while running and
 * `accumulatedMs` otherwise.
 */

import { StatusDefaults } from "@/constants/protocol";
import { Config } from "@/constants/timing";
import {
  SessionError,
  fail,
  ok,
  type ErrorInfo,
  type PostureLinkError,
  type Result,
} from "@/features/errors";
import {
  derivePostureState,
  isBadPostureState,
  type PostureState,
  type Reading,
} from "@/features/posture/reading";
import { EventHub, type EventListener, type Unsubscribe } from "@/features/state/event-hub";
import { createSessionRecord, withSessionId, type SessionRecord } from "./session-record";

const TAG = "[Session]";

// ============================================================================
// TYPES
// ============================================================================

export type SessionPhase = "inactive" | "running" | "paused";

/** What paused the session. A connectivity-loss pause ignores device un-pause. */
export type PauseReason = "user" | "device" | "connectionLoss";

/** What resumed it. Only "user" and "reconnect" clear a connectivity-loss pause. */
export type ResumeReason = "user" | "device" | "reconnect";

export interface SessionState {
  phase: SessionPhase;
  startedAt: number | null;
  accumulatedMs: number;
  segmentStartedAt: number | null;
  pausedForConnectionLoss: boolean;
  badPostureAlerts: number;
  breakReminderShown: boolean;
  alarmEnabled: boolean;
  /** Effective duration at the last tick or transition. */
  elapsedMs: number;
  postureState: PostureState | null;
  greenMm: number;
  redMm: number;
  lastError: ErrorInfo | null;
}

export type SessionEvent =
  | { type: "started"; startedAt: number }
  | { type: "pauseChanged"; paused: boolean; reason: PauseReason | ResumeReason }
  | { type: "tick"; elapsedMs: number }
  | { type: "postureChanged"; state: PostureState }
  | { type: "badPostureAlert"; count: number }
  | { type: "postureCorrected"; afterMs: number }
  | { type: "breakReminder"; elapsedMs: number }
  | { type: "timerReset" }
  | { type: "finalized"; record: SessionRecord }
  | { type: "discarded"; record: SessionRecord }
  | { type: "error"; error: ErrorInfo };

/** Where finished sessions go. Resolves to the id assigned by the store. */
export interface SessionSink {
  saveSession(record: SessionRecord): Promise<Result<string>>;
}

export interface SessionEngineOptions {
  sink: SessionSink;
  ownerId: string;
  alarmEnabled?: boolean;
  alertDelayMs?: number;
  breakReminderAfterMs?: number;
  minSavedSessionMs?: number;
  clock?: () => number;
}

export interface FinalizeOptions {
  /** End the session even if the record could not be saved. */
  discardOnFailure?: boolean;
}

function initialState(alarmEnabled: boolean): SessionState {
  return {
    phase: "inactive",
    startedAt: null,
    accumulatedMs: 0,
    segmentStartedAt: null,
    pausedForConnectionLoss: false,
    badPostureAlerts: 0,
    breakReminderShown: false,
    alarmEnabled,
    elapsedMs: 0,
    postureState: null,
    greenMm: StatusDefaults.GREEN_MM,
    redMm: StatusDefaults.RED_MM,
    lastError: null,
  };
}

// ============================================================================
// SESSION ENGINE
// ============================================================================

export class SessionEngine {
  private readonly sink: SessionSink;
  private readonly ownerId: string;
  private readonly alertDelayMs: number;
  private readonly breakReminderAfterMs: number;
  private readonly minSavedSessionMs: number;
  private readonly clock: () => number;
  private readonly events = new EventHub<SessionEvent>(TAG);

  private state: SessionState;

  // Bad-posture episode
  private inBadEpisode = false;
  private badSince: number | null = null;
  private alertTimeoutId: ReturnType<typeof setTimeout> | null = null;

  private saving = false;

  constructor(options: SessionEngineOptions) {
    this.sink = options.sink;
    this.ownerId = options.ownerId;
    this.alertDelayMs = options.alertDelayMs ?? Config.BAD_POSTURE_ALERT_DELAY_MS;
    this.breakReminderAfterMs = options.breakReminderAfterMs ?? Config.BREAK_REMINDER_AFTER_MS;
    this.minSavedSessionMs = options.minSavedSessionMs ?? Config.MIN_SAVED_SESSION_MS;
    this.clock = options.clock ?? (() => Date.now());
    this.state = initialState(options.alarmEnabled ?? true);
  }

  // ============================================================================
  // STATE ACCESS
  // ============================================================================

  getState(): SessionState {
    return { ...this.state };
  }

  addEventListener(listener: EventListener<SessionEvent>): Unsubscribe {
    return this.events.subscribe(listener);
  }

  isActive(): boolean {
    return this.state.phase !== "inactive";
  }

  isPaused(): boolean {
    return this.state.phase === "paused";
  }

  effectiveDurationMs(): number {
    const { phase, accumulatedMs, segmentStartedAt } = this.state;
    if (phase === "inactive") return 0;
    if (phase === "running" && segmentStartedAt !== null) {
      return accumulatedMs + Math.max(0, this.clock() - segmentStartedAt);
    }
    return accumulatedMs;
  }

  // ============================================================================
  // LIFECYCLE
  // ============================================================================

  /**
   * Begin a session. No-op (false) when one is already active.
   */
  start(): boolean {
    if (this.state.phase !== "inactive") return false;
    const now = this.clock();
    this.clearBadEpisode();
    this.state = {
      ...initialState(this.state.alarmEnabled),
      phase: "running",
      startedAt: now,
      segmentStartedAt: now,
      greenMm: this.state.greenMm,
      redMm: this.state.redMm,
      lastError: this.state.lastError,
    };
    this.log("Session started");
    this.emit({ type: "started", startedAt: now });
    return true;
  }

  pause(reason: PauseReason): boolean {
    if (this.state.phase !== "running") return false;
    const now = this.clock();
    const segmentStart = this.state.segmentStartedAt ?? now;
    this.state.accumulatedMs += Math.max(0, now - segmentStart);
    this.state.segmentStartedAt = null;
    this.state.phase = "paused";
    this.state.elapsedMs = this.state.accumulatedMs;
    if (reason === "connectionLoss") this.state.pausedForConnectionLoss = true;
    this.clearBadEpisode();
    this.log(`Paused (${reason}) at ${this.state.accumulatedMs}ms`);
    this.emit({ type: "pauseChanged", paused: true, reason });
    return true;
  }

  resume(reason: ResumeReason): boolean {
    if (this.state.phase !== "paused") return false;
    if (reason === "device" && this.state.pausedForConnectionLoss) return false;
    this.state.phase = "running";
    this.state.segmentStartedAt = this.clock();
    if (reason !== "device") this.state.pausedForConnectionLoss = false;
    this.log(`Resumed (${reason})`);
    this.emit({ type: "pauseChanged", paused: false, reason });
    return true;
  }

  /**
   * User pause/resume. Returns the new paused flag, or null without a session.
   */
  togglePause(): boolean | null {
    if (this.state.phase === "inactive") return null;
    if (this.state.phase === "running") {
      this.pause("user");
      return true;
    }
    this.resume("user");
    return false;
  }

  /**
   * Zero the clock of the active session without saving it.
   */
  resetTimer(): boolean {
    if (this.state.phase === "inactive") return false;
    const now = this.clock();
    this.state.startedAt = now;
    this.state.segmentStartedAt = now;
    this.state.accumulatedMs = 0;
    this.state.elapsedMs = 0;
    this.state.phase = "running";
    this.state.pausedForConnectionLoss = false;
    this.state.breakReminderShown = false;
    this.clearBadEpisode();
    this.log("Timer reset");
    this.emit({ type: "timerReset" });
    return true;
  }

  /**
   * Persist the session and return to inactive. On a failed save the session
   * stays active unless `discardOnFailure` is set.
   */
  async finalize(options: FinalizeOptions = {}): Promise<Result<SessionRecord>> {
    if (this.state.phase === "inactive") return fail(new SessionError());
    if (this.saving) return fail(new SessionError("Session is already being saved"));

    const record = this.buildRecord();
    this.clearBadEpisode();

    const saved = await this.save(record);
    if (!saved.ok) {
      this.handleError(saved.error);
      if (options.discardOnFailure) {
        this.endSession();
        this.log("Session discarded after failed save");
        this.emit({ type: "discarded", record });
      }
      return fail(saved.error);
    }

    const stored = withSessionId(record, saved.value);
    this.endSession();
    this.log(`Session finalized: ${stored.sessionId} (${stored.durationMs}ms)`);
    this.emit({ type: "finalized", record: stored });
    return ok(stored);
  }

  /**
   * Save the current session when it lasted long enough, then start a new
   * one. A failed save is reported but does not block the restart.
   */
  async restart(): Promise<Result<SessionRecord | null>> {
    if (this.state.phase === "inactive") return fail(new SessionError());
    if (this.saving) return fail(new SessionError("Session is already being saved"));

    const record = this.buildRecord();
    let stored: SessionRecord | null = null;
    if (record.durationMs > this.minSavedSessionMs) {
      const saved = await this.save(record);
      if (saved.ok) {
        stored = withSessionId(record, saved.value);
        this.emit({ type: "finalized", record: stored });
      } else {
        this.handleError(saved.error);
      }
    }

    this.endSession();
    this.start();
    return ok(stored);
  }

  dispose(): void {
    this.clearBadEpisode();
    this.events.clear();
  }

  // ============================================================================
  // PERIODIC AND READING-DRIVEN UPDATES
  // ============================================================================

  /**
   * Driven by the 1 s session clock.
   */
  tick(): void {
    if (this.state.phase === "inactive") return;
    const elapsed = this.effectiveDurationMs();
    this.state.elapsedMs = elapsed;
    this.emit({ type: "tick", elapsedMs: elapsed });

    if (!this.state.breakReminderShown && elapsed >= this.breakReminderAfterMs) {
      this.state.breakReminderShown = true;
      this.log(`Break reminder after ${elapsed}ms`);
      this.emit({ type: "breakReminder", elapsedMs: elapsed });
    }
  }

  observeReading(reading: Reading): void {
    this.state.greenMm = reading.greenMm;
    this.state.redMm = reading.redMm;

    const posture = derivePostureState(reading);
    if (posture !== this.state.postureState) {
      this.state.postureState = posture;
      this.emit({ type: "postureChanged", state: posture });
    }

    this.syncDevicePause(reading.paused);
    this.checkBadPosture(posture, reading.paused);
  }

  setAlarmEnabled(enabled: boolean): void {
    this.state.alarmEnabled = enabled;
    if (!enabled) this.cancelAlertTimer();
  }

  // ============================================================================
  // INTERNALS
  // ============================================================================

  private syncDevicePause(devicePaused: boolean): void {
    if (this.state.phase === "inactive") return;
    if (devicePaused === this.isPaused()) return;
    if (devicePaused) {
      this.pause("device");
    } else {
      this.resume("device");
    }
  }

  private checkBadPosture(posture: PostureState, devicePaused: boolean): void {
    if (this.state.phase !== "running" || devicePaused) {
      this.clearBadEpisode();
      return;
    }

    const bad = isBadPostureState(posture);
    if (bad && !this.inBadEpisode) {
      this.inBadEpisode = true;
      this.badSince = this.clock();
      if (this.state.alarmEnabled) this.scheduleAlert();
    } else if (!bad && this.inBadEpisode) {
      const afterMs = this.badSince === null ? 0 : this.clock() - this.badSince;
      this.clearBadEpisode();
      this.log(`Posture corrected after ${afterMs}ms`);
      this.emit({ type: "postureCorrected", afterMs });
    }
  }

  private scheduleAlert(): void {
    this.cancelAlertTimer();
    this.alertTimeoutId = setTimeout(() => {
      this.alertTimeoutId = null;
      if (!this.inBadEpisode || this.state.phase !== "running") return;
      this.state.badPostureAlerts++;
      this.log(`Bad posture alert #${this.state.badPostureAlerts}`);
      this.emit({ type: "badPostureAlert", count: this.state.badPostureAlerts });
    }, this.alertDelayMs);
  }

  private cancelAlertTimer(): void {
    if (this.alertTimeoutId) {
      clearTimeout(this.alertTimeoutId);
      this.alertTimeoutId = null;
    }
  }

  private clearBadEpisode(): void {
    this.inBadEpisode = false;
    this.badSince = null;
    this.cancelAlertTimer();
  }

  private buildRecord(): SessionRecord {
    const now = this.clock();
    return createSessionRecord({
      startTimestamp: this.state.startedAt ?? now,
      endTimestamp: now,
      durationMs: this.effectiveDurationMs(),
      badPostureAlerts: this.state.badPostureAlerts,
      breakAlertShown: this.state.breakReminderShown,
      greenMm: this.state.greenMm,
      redMm: this.state.redMm,
      ownerId: this.ownerId,
    });
  }

  private async save(record: SessionRecord): Promise<Result<string>> {
    this.saving = true;
    try {
      return await this.sink.saveSession(record);
    } finally {
      this.saving = false;
    }
  }

  private endSession(): void {
    this.clearBadEpisode();
    this.state = {
      ...initialState(this.state.alarmEnabled),
      greenMm: this.state.greenMm,
      redMm: this.state.redMm,
      postureState: this.state.postureState,
      lastError: this.state.lastError,
    };
  }

  private handleError(error: PostureLinkError): void {
    const info = error.toInfo(this.clock());
    this.state.lastError = info;
    this.emit({ type: "error", error: info });
    this.log(`Error: ${info.code}: ${info.message}`);
  }

  private emit(event: SessionEvent): void {
    this.events.emit(event);
  }

  private log(message: string): void {
    console.log(`${TAG} ${message}`);
  }
}
