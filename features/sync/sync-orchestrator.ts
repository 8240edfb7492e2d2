/**
 * Sync / buffer orchestrator.
 *
 * Writes each reading to the remote store's current node. When the store is
 * unreachable the reading goes to the offline buffer; once writes succeed
 * again, small batches are drained into the remote history in FIFO order.
 * Also the single gateway the session engine and the monitor use for
 * session records and thresholds.
 */

import { Config } from "@/constants/timing";
import {
  errorMessage,
  fail,
  ok,
  type ErrorInfo,
  type PostureLinkError,
  type Result,
} from "@/features/errors";
import type { Reading } from "@/features/posture/reading";
import type { SessionSink } from "@/features/session/session-engine";
import {
  computeSessionStatistics,
  type SessionRecord,
  type SessionStatistics,
} from "@/features/session/session-record";
import { EventHub, type EventListener, type Unsubscribe } from "@/features/state/event-hub";
import { RateLimiter } from "@/features/state/rate-limiter";
import type { OfflineReadingBuffer } from "@/features/storage/offline-buffer";
import type { RemoteResult, RemoteStore } from "@/features/storage/remote-store";

const TAG = "[Sync]";

export const OFFLINE_NOTICE = "No connection to the remote store: saving data locally";

export type SyncEvent =
  | { type: "notice"; message: string }
  | { type: "buffered"; size: number }
  | { type: "drained"; count: number; remaining: number }
  | { type: "error"; error: ErrorInfo };

export interface SyncState {
  lastWriteOk: boolean | null;
  buffered: number;
  draining: boolean;
  lastError: ErrorInfo | null;
}

export interface SyncOrchestratorOptions {
  store: RemoteStore;
  buffer: OfflineReadingBuffer;
  ownerId: string;
  drainBatch?: number;
  noticeIntervalMs?: number;
  clock?: () => number;
}

export class SyncOrchestrator implements SessionSink {
  private readonly store: RemoteStore;
  private readonly buffer: OfflineReadingBuffer;
  private readonly ownerId: string;
  private readonly drainBatch: number;
  private readonly clock: () => number;
  private readonly events = new EventHub<SyncEvent>(TAG);

  private readonly notices: RateLimiter;
  private drainTask: Promise<number> | null = null;

  private state: SyncState = {
    lastWriteOk: null,
    buffered: 0,
    draining: false,
    lastError: null,
  };

  constructor(options: SyncOrchestratorOptions) {
    this.store = options.store;
    this.buffer = options.buffer;
    this.ownerId = options.ownerId;
    this.drainBatch = options.drainBatch ?? Config.OFFLINE_DRAIN_BATCH;
    this.clock = options.clock ?? (() => Date.now());
    this.notices = new RateLimiter(
      options.noticeIntervalMs ?? Config.NOTICE_RATE_LIMIT_MS,
      this.clock,
    );
  }

  getState(): SyncState {
    return { ...this.state };
  }

  addEventListener(listener: EventListener<SyncEvent>): Unsubscribe {
    return this.events.subscribe(listener);
  }

  // ============================================================================
  // READINGS
  // ============================================================================

  /**
   * Never rejects. Resolves to true when the reading reached the store.
   */
  async persist(reading: Reading): Promise<boolean> {
    const written = await this.store.writeCurrent(this.ownerId, reading);
    if (!written.ok) {
      this.state.lastWriteOk = false;
      this.handleError(written.error);
      await this.bufferReading(reading);
      this.maybeNotify(OFFLINE_NOTICE);
      return false;
    }

    this.state.lastWriteOk = true;
    await this.drain();
    return true;
  }

  /**
   * Move up to one batch from the offline buffer into the remote history.
   * Only the confirmed prefix is dropped; the first failure stops the batch.
   * Concurrent callers share the drain in flight.
   */
  drain(): Promise<number> {
    if (this.drainTask) return this.drainTask;
    this.state.draining = true;
    this.drainTask = this.drainBatchOnce().finally(() => {
      this.drainTask = null;
      this.state.draining = false;
    });
    return this.drainTask;
  }

  private async drainBatchOnce(): Promise<number> {
    let batch: Reading[];
    try {
      batch = await this.buffer.peek(this.drainBatch);
    } catch (error) {
      console.error(`${TAG} Could not read offline buffer:`, errorMessage(error));
      return 0;
    }
    if (batch.length === 0) return 0;

    const sent: Reading[] = [];
    for (const reading of batch) {
      const appended = await this.store.appendHistory(this.ownerId, reading);
      if (!appended.ok) {
        this.handleError(appended.error);
        break;
      }
      sent.push(reading);
    }

    if (sent.length > 0) {
      // Enqueues may have evicted part of the batch while it was being sent
      try {
        await this.buffer.dropConfirmed(sent);
        this.state.buffered = await this.buffer.size();
      } catch (error) {
        console.error(`${TAG} Could not trim offline buffer:`, errorMessage(error));
      }
      this.log(`Drained ${sent.length} buffered reading(s), ${this.state.buffered} left`);
      this.events.emit({ type: "drained", count: sent.length, remaining: this.state.buffered });
    }
    return sent.length;
  }

  private async bufferReading(reading: Reading): Promise<void> {
    try {
      this.state.buffered = await this.buffer.enqueue(reading);
      this.events.emit({ type: "buffered", size: this.state.buffered });
    } catch (error) {
      console.error(`${TAG} Could not buffer reading:`, errorMessage(error));
    }
  }

  readHistory(limit: number = Config.HISTORY_LIMIT): Promise<RemoteResult<Reading[]>> {
    return this.store.readHistory(this.ownerId, limit);
  }

  /**
   * Remote mirror of the current reading. The feed is released on unsubscribe.
   */
  watchCurrent(listener: (reading: Reading | null) => void): Unsubscribe {
    const feed = this.store.subscribeCurrent(this.ownerId);
    const stop = feed.listen(listener);
    return () => {
      stop();
      feed.unsubscribe();
    };
  }

  async updateThresholds(greenMm: number, redMm: number): Promise<Result<void>> {
    const result = await this.store.updateThresholds(this.ownerId, greenMm, redMm);
    if (!result.ok) this.handleError(result.error);
    return result;
  }

  async clearCurrent(): Promise<Result<void>> {
    const result = await this.store.clearCurrent(this.ownerId);
    if (!result.ok) this.handleError(result.error);
    return result;
  }

  // ============================================================================
  // SESSIONS
  // ============================================================================

  async saveSession(record: SessionRecord): Promise<Result<string>> {
    const saved = await this.store.saveSession(this.ownerId, record);
    if (!saved.ok) {
      this.handleError(saved.error);
      return fail(saved.error);
    }
    return ok(saved.value);
  }

  readSessions(limit: number = Config.HISTORY_LIMIT): Promise<RemoteResult<SessionRecord[]>> {
    return this.store.readSessions(this.ownerId, limit);
  }

  watchSessions(
    listener: (sessions: SessionRecord[]) => void,
    limit: number = Config.HISTORY_LIMIT,
  ): Unsubscribe {
    const feed = this.store.subscribeSessions(this.ownerId, limit);
    const stop = feed.listen(listener);
    return () => {
      stop();
      feed.unsubscribe();
    };
  }

  async readStatistics(): Promise<Result<SessionStatistics>> {
    const sessions = await this.store.readSessions(this.ownerId, Config.STATISTICS_SAMPLE);
    if (!sessions.ok) return fail(sessions.error);
    return ok(computeSessionStatistics(sessions.value));
  }

  deleteSession(sessionId: string): Promise<RemoteResult<void>> {
    return this.store.deleteSession(this.ownerId, sessionId);
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private maybeNotify(message: string): void {
    if (!this.notices.tryAcquire(message)) return;
    this.events.emit({ type: "notice", message });
  }

  private handleError(error: PostureLinkError): void {
    const info = error.toInfo(this.clock());
    this.state.lastError = info;
    this.events.emit({ type: "error", error: info });
  }

  private log(message: string): void {
    console.log(`${TAG} ${message}`);
  }
}
