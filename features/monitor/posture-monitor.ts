/**
 * Posture monitor: the application-level orchestrator.
 *
 * Wires the link controller, session engine and sync orchestrator together
 * through their event streams, and owns the periodic tasks:
 *   - session clock (1 s): advances the effective duration
 *   - watchdog (1 s): forces a reconnect when a connected link goes silent
 *   - auto-reconnect: backoff loop after an involuntary disconnect
 *
 * Everything the user should see is published as `notice` events; the
 * audible side effect is a separate `alarm` event.
 */

import { StatusDefaults } from "@/constants/protocol";
import { Config } from "@/constants/timing";
import {
  LinkError,
  SessionError,
  fail,
  ok,
  type Result,
} from "@/features/errors";
import { AutoReconnector } from "@/features/link/auto-reconnect";
import type {
  ConnectionState,
  DisconnectCause,
  LinkController,
  LinkEvent,
} from "@/features/link/link-controller";
import type { PeerDescriptor } from "@/features/link/transport";
import { StaleDataWatchdog } from "@/features/link/watchdog";
import { derivePostureState, type PostureState, type Reading } from "@/features/posture/reading";
import type { SessionEngine, SessionEvent } from "@/features/session/session-engine";
import {
  formatSeatedTime,
  summarizeSession,
  type SessionRecord,
  type SessionStatistics,
} from "@/features/session/session-record";
import { EventHub, type EventListener, type Unsubscribe } from "@/features/state/event-hub";
import { RateLimiter } from "@/features/state/rate-limiter";
import type { RemoteResult } from "@/features/storage/remote-store";
import type { SyncEvent, SyncOrchestrator } from "@/features/sync/sync-orchestrator";

const TAG = "[Monitor]";

// Stale data and a closed stream count as one connection loss
const CONNECTION_LOSS_NOTICE_KEY = "connectionLoss";

export const Notices = {
  RECONNECTED_STILL_PAUSED: "Reconnected. Session still paused",
  RECONNECTED_RESUMED: "Reconnected. Session resumed",
  STALE_DATA: "No data from the sensor. Retrying connection...",
  CONNECTION_LOST: "Connection lost. Retrying...",
  CORRECT_POSTURE: "Correct your posture!",
  BREAK_REMINDER: "Time for a break! You have completed 1 hour of session",
  NO_ACTIVE_SESSION: "No active session",
  SENSOR_NOT_FOUND: "Sensor not found. Pair the HC-05/HC-06 first",
  DISCONNECTED: "Disconnected",
  TIMER_RESET: "Timer reset",
  SESSION_RESTARTED: "Session saved and restarted",
  SESSION_SAVE_FAILED: "Error saving the session",
} as const;

// ============================================================================
// TYPES
// ============================================================================

export interface MonitorState {
  connectionState: ConnectionState;
  peerName: string | null;
  isReconnecting: boolean;
  /** Live reading, or the remote mirror while not connected. */
  reading: Reading | null;
  postureState: PostureState | null;
  sessionActive: boolean;
  paused: boolean;
  seatedTime: string;
  badPostureAlerts: number;
  alarmEnabled: boolean;
  bufferedReadings: number;
}

const STATE_KEYS = [
  "connectionState",
  "peerName",
  "isReconnecting",
  "reading",
  "postureState",
  "sessionActive",
  "paused",
  "seatedTime",
  "badPostureAlerts",
  "alarmEnabled",
  "bufferedReadings",
] as const satisfies ReadonlyArray<keyof MonitorState>;

export type MonitorEvent =
  | { type: "notice"; message: string }
  | { type: "alarm"; reason: "badPosture" | "breakReminder" }
  | { type: "stateChanged"; state: MonitorState };

export interface PostureMonitorOptions {
  link: LinkController;
  session: SessionEngine;
  sync: SyncOrchestrator;
  /** Connect to this port instead of discovering an HC-05/HC-06. */
  fixedPeer?: PeerDescriptor;
  /** Resume a connectivity-loss pause once the reconnected sensor answers PING. */
  resumeAfterReconnect?: boolean;
  tickIntervalMs?: number;
  watchdogIntervalMs?: number;
  staleDataTimeoutMs?: number;
  reconnectBaseDelayMs?: number;
  reconnectMaxDelayMs?: number;
  noticeIntervalMs?: number;
  clock?: () => number;
}

// ============================================================================
// POSTURE MONITOR
// ============================================================================

export class PostureMonitor {
  private readonly link: LinkController;
  private readonly session: SessionEngine;
  private readonly sync: SyncOrchestrator;
  private readonly reconnector: AutoReconnector;
  private readonly watchdog: StaleDataWatchdog;
  private readonly notices: RateLimiter;
  private readonly events = new EventHub<MonitorEvent>(TAG);
  private readonly fixedPeer: PeerDescriptor | null;
  private readonly resumeAfterReconnect: boolean;
  private readonly tickIntervalMs: number;
  private readonly clock: () => number;

  private unsubscribers: Unsubscribe[] = [];
  private tickIntervalId: ReturnType<typeof setInterval> | null = null;
  private connectedAt: number | null = null;
  private awaitingReconnectAck = false;
  private started = false;

  private state: MonitorState;

  constructor(options: PostureMonitorOptions) {
    this.link = options.link;
    this.session = options.session;
    this.sync = options.sync;
    this.fixedPeer = options.fixedPeer ?? null;
    this.resumeAfterReconnect = options.resumeAfterReconnect ?? false;
    this.tickIntervalMs = options.tickIntervalMs ?? Config.SESSION_TICK_MS;
    this.clock = options.clock ?? (() => Date.now());
    this.notices = new RateLimiter(
      options.noticeIntervalMs ?? Config.NOTICE_RATE_LIMIT_MS,
      this.clock,
    );

    this.reconnector = new AutoReconnector(this.link, {
      baseDelayMs: options.reconnectBaseDelayMs,
      maxDelayMs: options.reconnectMaxDelayMs,
      clock: this.clock,
    });
    this.watchdog = new StaleDataWatchdog({
      isArmed: () =>
        this.link.isConnected() && !this.link.isManualDisconnect() && this.session.isActive(),
      lastActivityAt: () => this.lastActivityAt(),
      onStale: () => this.handleStaleData(),
      intervalMs: options.watchdogIntervalMs,
      timeoutMs: options.staleDataTimeoutMs,
      clock: this.clock,
    });

    const sessionState = this.session.getState();
    this.state = {
      connectionState: "disconnected",
      peerName: null,
      isReconnecting: false,
      reading: null,
      postureState: null,
      sessionActive: false,
      paused: false,
      seatedTime: formatSeatedTime(0),
      badPostureAlerts: 0,
      alarmEnabled: sessionState.alarmEnabled,
      bufferedReadings: 0,
    };
  }

  // ============================================================================
  // STATE ACCESS
  // ============================================================================

  getState(): MonitorState {
    return { ...this.state };
  }

  addEventListener(listener: EventListener<MonitorEvent>): Unsubscribe {
    return this.events.subscribe(listener);
  }

  // ============================================================================
  // LIFECYCLE
  // ============================================================================

  /**
   * Subscribe to the components and start the session clock and watchdog.
   */
  start(): void {
    if (this.started) return;
    this.started = true;

    this.unsubscribers.push(
      this.link.addEventListener((event) => this.handleLinkEvent(event)),
      this.session.addEventListener((event) => this.handleSessionEvent(event)),
      this.sync.addEventListener((event) => this.handleSyncEvent(event)),
      this.reconnector.addEventListener((event) => {
        if (event.type === "attemptStarted") this.log(`Reconnect attempt ${event.attempt}`);
        this.update({ isReconnecting: this.reconnector.isRunning });
      }),
      this.sync.watchCurrent((reading) => this.handleRemoteReading(reading)),
    );

    this.tickIntervalId = setInterval(() => this.session.tick(), this.tickIntervalMs);
    this.watchdog.start();
    this.log("Started");
  }

  async dispose(): Promise<void> {
    if (this.tickIntervalId) {
      clearInterval(this.tickIntervalId);
      this.tickIntervalId = null;
    }
    this.watchdog.stop();
    this.reconnector.stop();
    this.unsubscribers.forEach((unsub) => unsub());
    this.unsubscribers = [];
    await this.link.destroy();
    this.session.dispose();
    this.events.clear();
    this.started = false;
    this.log("Disposed");
  }

  // ============================================================================
  // CONNECTION OPERATIONS
  // ============================================================================

  async connectDefault(): Promise<Result<void>> {
    const peer = this.fixedPeer ?? (await this.link.findDefaultPeer());
    if (!peer) {
      this.notify(Notices.SENSOR_NOT_FOUND);
      return fail(new LinkError("PeerNotFound", Notices.SENSOR_NOT_FOUND));
    }
    this.notify(`Connecting to ${peer.name}...`);
    return this.connectTo(peer);
  }

  async connectTo(peer: PeerDescriptor): Promise<Result<void>> {
    this.reconnector.stop();
    const result = await this.link.connect(peer);
    if (result.ok) {
      this.notify(`Connected to ${peer.name}`);
    } else {
      this.notify(`Error: ${result.error.message}`);
    }
    return result;
  }

  /**
   * User disconnect: no auto-reconnect, and the active session ends.
   */
  async disconnect(): Promise<void> {
    this.reconnector.stop();
    this.awaitingReconnectAck = false;
    await this.link.disconnect();
    this.update({ reading: null, postureState: null });
    this.notify(Notices.DISCONNECTED);
    const cleared = await this.sync.clearCurrent();
    if (!cleared.ok) this.log(`Could not clear the remote reading: ${cleared.error.message}`);
    if (this.session.isActive()) {
      await this.endSession({ discardOnFailure: true });
    }
  }

  // ============================================================================
  // DEVICE SETTINGS
  // ============================================================================

  /**
   * Toggle the session pause and mirror it to the sensor when connected.
   * Resolves to the new paused flag.
   */
  async togglePause(): Promise<Result<boolean>> {
    const paused = this.session.togglePause();
    if (paused === null) {
      this.notify(Notices.NO_ACTIVE_SESSION);
      return fail(new SessionError());
    }
    if (this.link.isConnected()) {
      const sent = await this.link.setPause(paused ? "on" : "off");
      if (!sent.ok) {
        this.notify(`Could not send PAUSE ${paused ? "ON" : "OFF"} to the sensor`);
      }
    }
    return ok(paused);
  }

  async setGreenThreshold(mm: number): Promise<Result<void>> {
    const result = await this.link.setGreenThreshold(mm);
    if (!result.ok) {
      this.notify(`Error setting green threshold: ${result.error.message}`);
      return result;
    }
    await this.sync.updateThresholds(mm, this.currentThresholds().redMm);
    this.notify(`Green threshold set: ${mm} mm`);
    return result;
  }

  async setRedThreshold(mm: number): Promise<Result<void>> {
    const result = await this.link.setRedThreshold(mm);
    if (!result.ok) {
      this.notify(`Error setting red threshold: ${result.error.message}`);
      return result;
    }
    await this.sync.updateThresholds(this.currentThresholds().greenMm, mm);
    this.notify(`Red threshold set: ${mm} mm`);
    return result;
  }

  async setTimeThreshold(seconds: number): Promise<Result<void>> {
    const result = await this.link.setTimeThreshold(seconds * 1000);
    if (result.ok) {
      this.notify(`Alert time set: ${seconds} seconds`);
    } else {
      this.notify(`Error setting alert time: ${result.error.message}`);
    }
    return result;
  }

  async setAlarm(enabled: boolean): Promise<Result<void>> {
    const result = await this.link.setAlarm(enabled);
    if (!result.ok) {
      this.notify("Error setting alarm");
      return result;
    }
    this.session.setAlarmEnabled(enabled);
    this.update({ alarmEnabled: enabled });
    this.notify(enabled ? "Alarm enabled" : "Alarm disabled");
    return result;
  }

  // ============================================================================
  // SESSION OPERATIONS
  // ============================================================================

  async finalizeSession(): Promise<Result<SessionRecord>> {
    if (!this.session.isActive()) {
      this.notify(Notices.NO_ACTIVE_SESSION);
      return fail(new SessionError());
    }
    return this.endSession({});
  }

  async restartSession(): Promise<Result<SessionRecord | null>> {
    if (!this.session.isActive()) {
      this.notify(Notices.NO_ACTIVE_SESSION);
      return fail(new SessionError());
    }
    const result = await this.session.restart();
    if (result.ok) this.notify(Notices.SESSION_RESTARTED);
    this.syncSessionState();
    return result;
  }

  resetTimer(): boolean {
    const reset = this.session.resetTimer();
    this.notify(reset ? Notices.TIMER_RESET : Notices.NO_ACTIVE_SESSION);
    this.syncSessionState();
    return reset;
  }

  sessionHistory(limit?: number): Promise<RemoteResult<SessionRecord[]>> {
    return this.sync.readSessions(limit);
  }

  /** Live session list, newest first. */
  watchSessionHistory(listener: (sessions: SessionRecord[]) => void, limit?: number): Unsubscribe {
    return this.sync.watchSessions(listener, limit);
  }

  async deleteSession(sessionId: string): Promise<RemoteResult<void>> {
    const result = await this.sync.deleteSession(sessionId);
    this.notify(result.ok ? "Session deleted" : `Error deleting the session: ${result.error.message}`);
    return result;
  }

  statistics(): Promise<Result<SessionStatistics>> {
    return this.sync.readStatistics();
  }

  // ============================================================================
  // EVENT HANDLERS
  // ============================================================================

  private handleLinkEvent(event: LinkEvent): void {
    switch (event.type) {
      case "connectionStateChanged":
        this.update({
          connectionState: event.state,
          peerName: event.state === "disconnected" ? null : (event.peer?.name ?? null),
        });
        if (event.state === "connected") {
          this.handleConnected();
        } else if (event.state === "disconnected") {
          this.handleDisconnected(event.cause);
        }
        break;
      case "reading":
        this.handleReading(event.reading);
        break;
      case "pong":
        if (this.awaitingReconnectAck) {
          this.awaitingReconnectAck = false;
          if (this.session.resume("reconnect")) this.notify(Notices.RECONNECTED_RESUMED);
        }
        break;
      case "deviceError":
        this.notify(`Sensor error: ${event.reason}`);
        break;
      case "error":
        if (event.error.code === "StreamClosed") {
          this.notifyLimited(CONNECTION_LOSS_NOTICE_KEY, Notices.CONNECTION_LOST);
        }
        break;
      default:
        break;
    }
  }

  private handleConnected(): void {
    this.connectedAt = this.clock();
    this.reconnector.stop();
    this.update({ isReconnecting: false });

    if (!this.session.isActive()) {
      this.session.start();
    } else if (this.session.getState().pausedForConnectionLoss) {
      if (this.resumeAfterReconnect) {
        this.awaitingReconnectAck = true;
      } else {
        this.notify(Notices.RECONNECTED_STILL_PAUSED);
      }
    }
    this.syncSessionState();
  }

  private handleDisconnected(cause: DisconnectCause | undefined): void {
    this.connectedAt = null;
    this.awaitingReconnectAck = false;
    if (cause === "manual" || cause === "replaced") return;

    // Involuntary: pause and keep trying
    if (this.session.isActive()) {
      this.session.pause("connectionLoss");
      this.reconnector.start();
    }
    this.update({ isReconnecting: this.reconnector.isRunning });
    this.syncSessionState();
  }

  private handleReading(reading: Reading): void {
    this.session.observeReading(reading);
    this.update({ reading, postureState: derivePostureState(reading) });
    this.sync.persist(reading).catch((err: unknown) => {
      console.error(`${TAG} persist failed:`, err);
    });
  }

  private handleRemoteReading(reading: Reading | null): void {
    if (this.link.isConnected() || reading === null) return;
    this.update({ reading, postureState: derivePostureState(reading) });
  }

  private handleStaleData(): void {
    this.session.pause("connectionLoss");
    this.notifyLimited(CONNECTION_LOSS_NOTICE_KEY, Notices.STALE_DATA);
    this.link.drop("No data from sensor").catch((err: unknown) => {
      console.error(`${TAG} drop failed:`, err);
    });
  }

  private handleSessionEvent(event: SessionEvent): void {
    switch (event.type) {
      case "tick":
        this.update({ seatedTime: formatSeatedTime(event.elapsedMs) });
        break;
      case "badPostureAlert":
        if (this.session.getState().alarmEnabled) {
          this.events.emit({ type: "alarm", reason: "badPosture" });
        }
        this.notify(Notices.CORRECT_POSTURE);
        this.update({ badPostureAlerts: event.count });
        break;
      case "breakReminder":
        if (this.session.getState().alarmEnabled) {
          this.events.emit({ type: "alarm", reason: "breakReminder" });
        }
        this.notify(Notices.BREAK_REMINDER);
        break;
      case "started":
      case "pauseChanged":
      case "timerReset":
      case "finalized":
      case "discarded":
        this.syncSessionState();
        break;
      default:
        break;
    }
  }

  private handleSyncEvent(event: SyncEvent): void {
    switch (event.type) {
      case "notice":
        this.notify(event.message);
        break;
      case "buffered":
        this.update({ bufferedReadings: event.size });
        break;
      case "drained":
        this.update({ bufferedReadings: event.remaining });
        break;
      default:
        break;
    }
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private async endSession(options: { discardOnFailure?: boolean }): Promise<Result<SessionRecord>> {
    const result = await this.session.finalize(options);
    if (result.ok) {
      this.notify(`Session finished. ${summarizeSession(result.value)}`);
    } else {
      this.notify(Notices.SESSION_SAVE_FAILED);
    }
    this.syncSessionState();
    return result;
  }

  private lastActivityAt(): number | null {
    const { lastReadingAt } = this.link.getState();
    if (lastReadingAt === null) return this.connectedAt;
    if (this.connectedAt === null) return lastReadingAt;
    return Math.max(lastReadingAt, this.connectedAt);
  }

  private currentThresholds(): { greenMm: number; redMm: number } {
    const reading = this.link.getState().latestReading;
    return {
      greenMm: reading?.greenMm ?? StatusDefaults.GREEN_MM,
      redMm: reading?.redMm ?? StatusDefaults.RED_MM,
    };
  }

  private syncSessionState(): void {
    const s = this.session.getState();
    this.update({
      sessionActive: s.phase !== "inactive",
      paused: s.phase === "paused",
      seatedTime: formatSeatedTime(this.session.effectiveDurationMs()),
      badPostureAlerts: s.badPostureAlerts,
      alarmEnabled: s.alarmEnabled,
    });
  }

  private update(patch: Partial<MonitorState>): void {
    const next: MonitorState = { ...this.state, ...patch };
    if (!STATE_KEYS.some((key) => next[key] !== this.state[key])) return;
    this.state = next;
    this.events.emit({ type: "stateChanged", state: this.getState() });
  }

  private notify(message: string): void {
    this.log(`Notice: ${message}`);
    this.events.emit({ type: "notice", message });
  }

  private notifyLimited(key: string, message: string): void {
    if (this.notices.tryAcquire(key)) this.notify(message);
  }

  private log(message: string): void {
    console.log(`${TAG} ${message}`);
  }
}
