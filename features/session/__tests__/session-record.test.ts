import { describe, it, expect } from "vitest";
import {
  computeSessionStatistics,
  createSessionRecord,
  formatDuration,
  formatSeatedTime,
  sessionRecordFromJSON,
  sessionRecordToJSON,
  summarizeSession,
  withSessionId,
} from "../session-record";

const base = {
  startTimestamp: 1_000,
  endTimestamp: 61_000,
  durationMs: 60_000,
  badPostureAlerts: 2,
  breakAlertShown: false,
  ownerId: "user-1",
};

describe("createSessionRecord", () => {
  it("defaults the id and thresholds", () => {
    const record = createSessionRecord(base);
    expect(record.sessionId).toBe("");
    expect(record.greenMm).toBe(80);
    expect(record.redMm).toBe(120);
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("withSessionId returns a new record", () => {
    const record = createSessionRecord(base);
    const stored = withSessionId(record, "abc");
    expect(stored.sessionId).toBe("abc");
    expect(record.sessionId).toBe("");
  });
});

describe("session record JSON", () => {
  it("stores everything but the id", () => {
    const json = sessionRecordToJSON(createSessionRecord({ ...base, sessionId: "abc" }));
    expect(json).toEqual({ ...base, greenMm: 80, redMm: 120 });
  });

  it("reads a stored record back under its key", () => {
    const record = sessionRecordFromJSON("abc", { ...base, greenMm: 90, redMm: 150 });
    expect(record).toEqual({ ...base, sessionId: "abc", greenMm: 90, redMm: 150 });
  });

  it("defaults optional fields", () => {
    const record = sessionRecordFromJSON("k", {
      startTimestamp: 1,
      endTimestamp: 2,
      durationMs: 1,
    });
    expect(record).toEqual({
      sessionId: "k",
      startTimestamp: 1,
      endTimestamp: 2,
      durationMs: 1,
      badPostureAlerts: 0,
      breakAlertShown: false,
      greenMm: 80,
      redMm: 120,
      ownerId: "",
    });
  });

  it("rejects records without timestamps or duration", () => {
    expect(sessionRecordFromJSON("k", { startTimestamp: 1, endTimestamp: 2 })).toBeNull();
    expect(sessionRecordFromJSON("k", { ...base, durationMs: "60" })).toBeNull();
    expect(sessionRecordFromJSON("k", null)).toBeNull();
    expect(sessionRecordFromJSON("k", [base])).toBeNull();
  });
});

describe("formatting", () => {
  it("formats the live seated time as HH:MM:SS", () => {
    expect(formatSeatedTime(0)).toBe("00:00:00");
    expect(formatSeatedTime(3_909_999)).toBe("01:05:09");
    expect(formatSeatedTime(-5_000)).toBe("00:00:00");
  });

  it("formats durations with the largest unit first", () => {
    expect(formatDuration(9_400)).toBe("9s");
    expect(formatDuration(185_000)).toBe("3m 5s");
    expect(formatDuration(9_342_000)).toBe("2h 35m 42s");
  });

  it("summarizes a session", () => {
    expect(summarizeSession(createSessionRecord(base))).toBe("Duration: 1m 0s | Alerts: 2");
  });
});

describe("computeSessionStatistics", () => {
  it("is all zeros without sessions", () => {
    expect(computeSessionStatistics([])).toEqual({
      totalSessions: 0,
      totalDurationMs: 0,
      totalAlerts: 0,
      averageDurationMs: 0,
      averageAlerts: 0,
    });
  });

  it("totals and averages", () => {
    const records = [
      createSessionRecord({ ...base, durationMs: 10_000, badPostureAlerts: 1 }),
      createSessionRecord({ ...base, durationMs: 20_000, badPostureAlerts: 0 }),
      createSessionRecord({ ...base, durationMs: 20_001, badPostureAlerts: 4 }),
    ];
    expect(computeSessionStatistics(records)).toEqual({
      totalSessions: 3,
      totalDurationMs: 50_001,
      totalAlerts: 5,
      averageDurationMs: 16_667,
      averageAlerts: 5 / 3,
    });
  });
});
