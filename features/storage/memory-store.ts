/**
 * In-process remote store. Used when no database is configured and as the
 * stand-in for the remote database in tests.
 */

import { RemoteWriteError, fail, ok } from "@/features/errors";
import type { Reading } from "@/features/posture/reading";
import { withSessionId, type SessionRecord } from "@/features/session/session-record";
import { ChangeFeed } from "@/features/state/change-feed";
import { sortSessionsNewestFirst, type RemoteResult, type RemoteStore } from "./remote-store";

interface OwnerData {
  current: Reading | null;
  history: Array<{ key: string; reading: Reading }>;
  sessions: Map<string, SessionRecord>;
  currentFeeds: Set<ChangeFeed<Reading | null>>;
  sessionFeeds: Set<{ feed: ChangeFeed<SessionRecord[]>; limit: number }>;
}

export class MemoryRemoteStore implements RemoteStore {
  private owners = new Map<string, OwnerData>();
  private nextKey = 1;

  /** While true, every write fails with RemoteWriteFailed. */
  offline = false;

  // ============================================================================
  // READINGS
  // ============================================================================

  async writeCurrent(ownerId: string, reading: Reading): Promise<RemoteResult<void>> {
    if (this.offline) return this.unavailable("writeCurrent");
    const data = this.owner(ownerId);
    data.current = reading;
    data.currentFeeds.forEach((feed) => feed.push(reading));
    return ok(undefined);
  }

  async appendHistory(ownerId: string, reading: Reading): Promise<RemoteResult<string>> {
    if (this.offline) return this.unavailable("appendHistory");
    const key = this.generateKey("h");
    this.owner(ownerId).history.push({ key, reading });
    return ok(key);
  }

  async readHistory(ownerId: string, limit: number): Promise<RemoteResult<Reading[]>> {
    if (this.offline) return this.unavailable("readHistory");
    const sorted = this.owner(ownerId)
      .history.map((entry) => entry.reading)
      .sort((a, b) => a.timestamp - b.timestamp);
    return ok(limit > 0 ? sorted.slice(-limit) : []);
  }

  subscribeCurrent(ownerId: string): ChangeFeed<Reading | null> {
    const data = this.owner(ownerId);
    const feed = new ChangeFeed<Reading | null>();
    data.currentFeeds.add(feed);
    feed.bind(() => {
      data.currentFeeds.delete(feed);
    });
    feed.push(data.current);
    return feed;
  }

  async updateThresholds(
    ownerId: string,
    greenMm: number,
    redMm: number,
  ): Promise<RemoteResult<void>> {
    if (this.offline) return this.unavailable("updateThresholds");
    const data = this.owner(ownerId);
    if (data.current) {
      data.current = Object.freeze({ ...data.current, greenMm, redMm });
      const current = data.current;
      data.currentFeeds.forEach((feed) => feed.push(current));
    }
    return ok(undefined);
  }

  async clearCurrent(ownerId: string): Promise<RemoteResult<void>> {
    if (this.offline) return this.unavailable("clearCurrent");
    const data = this.owner(ownerId);
    data.current = null;
    data.currentFeeds.forEach((feed) => feed.push(null));
    return ok(undefined);
  }

  // ============================================================================
  // SESSIONS
  // ============================================================================

  async saveSession(ownerId: string, record: SessionRecord): Promise<RemoteResult<string>> {
    if (this.offline) return this.unavailable("saveSession");
    const sessionId = record.sessionId || this.generateKey("s");
    const data = this.owner(ownerId);
    data.sessions.set(sessionId, withSessionId({ ...record, ownerId }, sessionId));
    this.publishSessions(data);
    return ok(sessionId);
  }

  async readSessions(ownerId: string, limit: number): Promise<RemoteResult<SessionRecord[]>> {
    if (this.offline) return this.unavailable("readSessions");
    return ok(this.sessionsOf(this.owner(ownerId), limit));
  }

  subscribeSessions(ownerId: string, limit: number): ChangeFeed<SessionRecord[]> {
    const data = this.owner(ownerId);
    const feed = new ChangeFeed<SessionRecord[]>();
    const entry = { feed, limit };
    data.sessionFeeds.add(entry);
    feed.bind(() => {
      data.sessionFeeds.delete(entry);
    });
    feed.push(this.sessionsOf(data, limit));
    return feed;
  }

  async deleteSession(ownerId: string, sessionId: string): Promise<RemoteResult<void>> {
    if (this.offline) return this.unavailable("deleteSession");
    const data = this.owner(ownerId);
    data.sessions.delete(sessionId);
    this.publishSessions(data);
    return ok(undefined);
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private owner(ownerId: string): OwnerData {
    let data = this.owners.get(ownerId);
    if (!data) {
      data = {
        current: null,
        history: [],
        sessions: new Map(),
        currentFeeds: new Set(),
        sessionFeeds: new Set(),
      };
      this.owners.set(ownerId, data);
    }
    return data;
  }

  private sessionsOf(data: OwnerData, limit: number): SessionRecord[] {
    return sortSessionsNewestFirst([...data.sessions.values()]).slice(0, Math.max(0, limit));
  }

  private publishSessions(data: OwnerData): void {
    data.sessionFeeds.forEach(({ feed, limit }) => feed.push(this.sessionsOf(data, limit)));
  }

  private generateKey(prefix: string): string {
    return `${prefix}${(this.nextKey++).toString().padStart(6, "0")}`;
  }

  private unavailable(operation: string): RemoteResult<never> {
    return fail(new RemoteWriteError(`${operation} failed: store offline`));
  }
}
