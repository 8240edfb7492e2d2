/**
 * Finished-session record and the helpers used to present and summarize it.
 */

import { StatusDefaults } from "@/constants/protocol";
import { objectFields } from "@/features/posture/reading";

export interface SessionRecord {
  /** Empty until the remote store assigns one. */
  readonly sessionId: string;
  readonly startTimestamp: number;
  readonly endTimestamp: number;
  /** Time spent running; paused intervals are excluded. */
  readonly durationMs: number;
  readonly badPostureAlerts: number;
  readonly breakAlertShown: boolean;
  readonly greenMm: number;
  readonly redMm: number;
  readonly ownerId: string;
}

export interface SessionStatistics {
  totalSessions: number;
  totalDurationMs: number;
  totalAlerts: number;
  averageDurationMs: number;
  averageAlerts: number;
}

export function createSessionRecord(
  fields: Omit<SessionRecord, "sessionId" | "greenMm" | "redMm"> &
    Partial<Pick<SessionRecord, "sessionId" | "greenMm" | "redMm">>,
): SessionRecord {
  return Object.freeze({
    sessionId: fields.sessionId ?? "",
    startTimestamp: fields.startTimestamp,
    endTimestamp: fields.endTimestamp,
    durationMs: fields.durationMs,
    badPostureAlerts: fields.badPostureAlerts,
    breakAlertShown: fields.breakAlertShown,
    greenMm: fields.greenMm ?? StatusDefaults.GREEN_MM,
    redMm: fields.redMm ?? StatusDefaults.RED_MM,
    ownerId: fields.ownerId,
  });
}

export function withSessionId(record: SessionRecord, sessionId: string): SessionRecord {
  return Object.freeze({ ...record, sessionId });
}

function num(source: Record<string, unknown>, key: string): number | null {
  const v = source[key];
  return typeof v === "number" && Number.isFinite(v) ? v : null;
}

/**
 * Rebuild a record read back from the remote store. Returns null when a
 * required field is missing or mistyped.
 */
export function sessionRecordFromJSON(sessionId: string, value: unknown): SessionRecord | null {
  const source = objectFields(value);
  if (!source) return null;

  const start = num(source, "startTimestamp");
  const end = num(source, "endTimestamp");
  const duration = num(source, "durationMs");
  if (start === null || end === null || duration === null) return null;

  const owner = source.ownerId;
  return createSessionRecord({
    sessionId,
    startTimestamp: start,
    endTimestamp: end,
    durationMs: duration,
    badPostureAlerts: num(source, "badPostureAlerts") ?? 0,
    breakAlertShown: source.breakAlertShown === true,
    greenMm: num(source, "greenMm") ?? StatusDefaults.GREEN_MM,
    redMm: num(source, "redMm") ?? StatusDefaults.RED_MM,
    ownerId: typeof owner === "string" ? owner : "",
  });
}

/** Stored shape; the id is the key it lives under. */
export function sessionRecordToJSON(record: SessionRecord): Omit<SessionRecord, "sessionId"> {
  return {
    startTimestamp: record.startTimestamp,
    endTimestamp: record.endTimestamp,
    durationMs: record.durationMs,
    badPostureAlerts: record.badPostureAlerts,
    breakAlertShown: record.breakAlertShown,
    greenMm: record.greenMm,
    redMm: record.redMm,
    ownerId: record.ownerId,
  };
}

// ============================================================================
// FORMATTING
// ============================================================================

function pad2(n: number): string {
  return n.toString().padStart(2, "0");
}

/** Live seated-time display, e.g. `01:05:09`. */
export function formatSeatedTime(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
}

/** `2h 35m 42s`, `3m 5s` or `9s`. */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

export function summarizeSession(record: SessionRecord): string {
  return `Duration: ${formatDuration(record.durationMs)} | Alerts: ${record.badPostureAlerts}`;
}

export function computeSessionStatistics(records: readonly SessionRecord[]): SessionStatistics {
  const totalSessions = records.length;
  const totalDurationMs = records.reduce((sum, r) => sum + r.durationMs, 0);
  const totalAlerts = records.reduce((sum, r) => sum + r.badPostureAlerts, 0);
  return {
    totalSessions,
    totalDurationMs,
    totalAlerts,
    averageDurationMs: totalSessions > 0 ? Math.floor(totalDurationMs / totalSessions) : 0,
    averageAlerts: totalSessions > 0 ? totalAlerts / totalSessions : 0,
  };
}
