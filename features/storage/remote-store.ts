/**
 * External store contract, keyed by owner id.
 *
 * Every operation is asynchronous and fallible; failures resolve to a
 * RemoteWriteFailed result instead of rejecting.
 */

import type { RemoteWriteError, Result } from "@/features/errors";
import type { Reading } from "@/features/posture/reading";
import type { SessionRecord } from "@/features/session/session-record";
import type { ChangeFeed } from "@/features/state/change-feed";

export type RemoteResult<T> = Result<T, RemoteWriteError>;

export interface RemoteStore {
  writeCurrent(ownerId: string, reading: Reading): Promise<RemoteResult<void>>;
  /** Resolves to the generated history key. */
  appendHistory(ownerId: string, reading: Reading): Promise<RemoteResult<string>>;
  /** Up to `limit` entries ordered by timestamp, most recent last. */
  readHistory(ownerId: string, limit: number): Promise<RemoteResult<Reading[]>>;
  /** Current reading, or null when the node is absent. */
  subscribeCurrent(ownerId: string): ChangeFeed<Reading | null>;
  updateThresholds(ownerId: string, greenMm: number, redMm: number): Promise<RemoteResult<void>>;
  clearCurrent(ownerId: string): Promise<RemoteResult<void>>;

  /** Resolves to the generated session id. */
  saveSession(ownerId: string, record: SessionRecord): Promise<RemoteResult<string>>;
  /** Up to `limit` sessions, most recent first. */
  readSessions(ownerId: string, limit: number): Promise<RemoteResult<SessionRecord[]>>;
  subscribeSessions(ownerId: string, limit: number): ChangeFeed<SessionRecord[]>;
  deleteSession(ownerId: string, sessionId: string): Promise<RemoteResult<void>>;
}

export function currentPath(ownerId: string): string {
  return `users/${ownerId}/posture/current`;
}

export function historyPath(ownerId: string): string {
  return `users/${ownerId}/posture/history`;
}

export function sessionsPath(ownerId: string): string {
  return `users/${ownerId}/sessions`;
}

export function sessionPath(ownerId: string, sessionId: string): string {
  return `${sessionsPath(ownerId)}/${sessionId}`;
}

/** Newest first by start time. */
export function sortSessionsNewestFirst(records: readonly SessionRecord[]): SessionRecord[] {
  return [...records].sort((a, b) => b.startTimestamp - a.startTimestamp);
}
