/**
 * Firebase Realtime Database implementation of the remote store.
 *
 *   users/{owner}/posture/current       latest reading
 *   users/{owner}/posture/history/{key} buffered readings
 *   users/{owner}/sessions/{id}         finished sessions
 */

import { initializeApp, type FirebaseOptions } from "firebase/app";
import {
  get,
  getDatabase,
  limitToLast,
  onValue,
  orderByChild,
  push,
  query,
  ref,
  remove,
  set,
  update,
  type DataSnapshot,
  type Database,
} from "firebase/database";

import { Config } from "@/constants/timing";
import { RemoteWriteError, errorMessage, fail, ok } from "@/features/errors";
import { readingFromJSON, readingToJSON, type Reading } from "@/features/posture/reading";
import {
  sessionRecordFromJSON,
  sessionRecordToJSON,
  type SessionRecord,
} from "@/features/session/session-record";
import { ChangeFeed } from "@/features/state/change-feed";
import {
  currentPath,
  historyPath,
  sessionPath,
  sessionsPath,
  sortSessionsNewestFirst,
  type RemoteResult,
  type RemoteStore,
} from "./remote-store";

const TAG = "[Firebase]";

export interface FirebaseStoreConfig {
  apiKey?: string;
  databaseURL: string;
  projectId?: string;
  appId?: string;
}

export interface FirebaseStoreOptions {
  /** Operations still pending after this long fail with RemoteWriteFailed. */
  timeoutMs?: number;
}

/**
 * Initialize the default app and return its database handle.
 */
export function createFirebaseDatabase(config: FirebaseStoreConfig): Database {
  if (!config.databaseURL) {
    throw new Error("Missing databaseURL. Set POSTURE_FIREBASE_DATABASE_URL.");
  }
  const options: FirebaseOptions = {
    apiKey: config.apiKey,
    databaseURL: config.databaseURL,
    projectId: config.projectId,
    appId: config.appId,
  };
  return getDatabase(initializeApp(options));
}

function collectReadings(snapshot: DataSnapshot): Reading[] {
  const readings: Reading[] = [];
  snapshot.forEach((child) => {
    const value: unknown = child.val();
    const reading = readingFromJSON(value);
    if (reading) readings.push(reading);
  });
  return readings;
}

function collectSessions(snapshot: DataSnapshot): SessionRecord[] {
  const sessions: SessionRecord[] = [];
  snapshot.forEach((child) => {
    const value: unknown = child.val();
    const record = child.key ? sessionRecordFromJSON(child.key, value) : null;
    if (record) sessions.push(record);
  });
  return sortSessionsNewestFirst(sessions);
}

function withTimeout<T>(work: Promise<T>, ms: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timeoutId = setTimeout(() => reject(new Error(`timed out after ${ms} ms`)), ms);
    work.then(
      (value) => {
        clearTimeout(timeoutId);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      },
    );
  });
}

export class FirebaseRemoteStore implements RemoteStore {
  private readonly timeoutMs: number;

  constructor(
    private readonly db: Database,
    options: FirebaseStoreOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? Config.REMOTE_WRITE_TIMEOUT_MS;
  }

  // ============================================================================
  // READINGS
  // ============================================================================

  writeCurrent(ownerId: string, reading: Reading): Promise<RemoteResult<void>> {
    return this.attempt("writeCurrent", () =>
      set(ref(this.db, currentPath(ownerId)), readingToJSON(reading)),
    );
  }

  appendHistory(ownerId: string, reading: Reading): Promise<RemoteResult<string>> {
    return this.attempt("appendHistory", async () => {
      const entry = push(ref(this.db, historyPath(ownerId)));
      if (!entry.key) throw new Error("Could not generate history key");
      await set(entry, readingToJSON(reading));
      return entry.key;
    });
  }

  readHistory(ownerId: string, limit: number): Promise<RemoteResult<Reading[]>> {
    return this.attempt("readHistory", async () => {
      const snapshot = await get(
        query(ref(this.db, historyPath(ownerId)), orderByChild("timestamp"), limitToLast(limit)),
      );
      return collectReadings(snapshot);
    });
  }

  subscribeCurrent(ownerId: string): ChangeFeed<Reading | null> {
    const feed = new ChangeFeed<Reading | null>();
    const unsub = onValue(
      ref(this.db, currentPath(ownerId)),
      (snapshot) => {
        const value: unknown = snapshot.exists() ? snapshot.val() : null;
        feed.push(readingFromJSON(value));
      },
      (error) => {
        console.error(`${TAG} subscribeCurrent cancelled:`, error.message);
        feed.fail(new RemoteWriteError(error.message, { cause: error }));
      },
    );
    feed.bind(unsub);
    return feed;
  }

  updateThresholds(ownerId: string, greenMm: number, redMm: number): Promise<RemoteResult<void>> {
    return this.attempt("updateThresholds", () =>
      update(ref(this.db, `users/${ownerId}/posture`), {
        "current/greenMm": greenMm,
        "current/redMm": redMm,
      }),
    );
  }

  clearCurrent(ownerId: string): Promise<RemoteResult<void>> {
    return this.attempt("clearCurrent", () => remove(ref(this.db, currentPath(ownerId))));
  }

  // ============================================================================
  // SESSIONS
  // ============================================================================

  saveSession(ownerId: string, record: SessionRecord): Promise<RemoteResult<string>> {
    return this.attempt("saveSession", async () => {
      const sessionId = record.sessionId || push(ref(this.db, sessionsPath(ownerId))).key;
      if (!sessionId) throw new Error("Could not generate session id");
      await set(ref(this.db, sessionPath(ownerId, sessionId)), {
        sessionId,
        ...sessionRecordToJSON(record),
        ownerId,
      });
      this.log(`Session saved: ${sessionId}`);
      return sessionId;
    });
  }

  readSessions(ownerId: string, limit: number): Promise<RemoteResult<SessionRecord[]>> {
    return this.attempt("readSessions", async () => {
      const snapshot = await get(
        query(
          ref(this.db, sessionsPath(ownerId)),
          orderByChild("startTimestamp"),
          limitToLast(limit),
        ),
      );
      return collectSessions(snapshot);
    });
  }

  subscribeSessions(ownerId: string, limit: number): ChangeFeed<SessionRecord[]> {
    const feed = new ChangeFeed<SessionRecord[]>();
    const unsub = onValue(
      query(ref(this.db, sessionsPath(ownerId)), orderByChild("startTimestamp"), limitToLast(limit)),
      (snapshot) => {
        feed.push(collectSessions(snapshot).slice(0, limit));
      },
      (error) => {
        console.error(`${TAG} subscribeSessions cancelled:`, error.message);
        feed.fail(new RemoteWriteError(error.message, { cause: error }));
      },
    );
    feed.bind(unsub);
    return feed;
  }

  deleteSession(ownerId: string, sessionId: string): Promise<RemoteResult<void>> {
    return this.attempt("deleteSession", () => remove(ref(this.db, sessionPath(ownerId, sessionId))));
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private async attempt<T>(operation: string, fn: () => Promise<T>): Promise<RemoteResult<T>> {
    try {
      return ok(await withTimeout(fn(), this.timeoutMs));
    } catch (error) {
      console.warn(`${TAG} ${operation} failed: ${errorMessage(error)}`);
      return fail(
        new RemoteWriteError(`${operation} failed: ${errorMessage(error)}`, { cause: error }),
      );
    }
  }

  private log(message: string): void {
    console.log(`${TAG} ${message}`);
  }
}
