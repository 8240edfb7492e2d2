/**
 * Reading model and posture classification.
 *
 * A Reading is one decoded status snapshot from the sensor. Flags computed by
 * the firmware (pause, sustained alert, bad posture) always win over the zone
 * recomputed here, so the app never contradicts the device LEDs.
 */

import { StatusDefaults } from "@/constants/protocol";

// ============================================================================
// TYPES
// ============================================================================

export interface Reading {
  readonly distanceMm: number;
  readonly seated: boolean;
  readonly badPosture: boolean;
  readonly alertActive: boolean;
  readonly greenMm: number;
  readonly redMm: number;
  readonly paused: boolean;
  readonly timestamp: number;
}

export type PostureState = "correct" | "warning" | "bad" | "alert";

// ============================================================================
// CONSTRUCTION
// ============================================================================

export function createReading(
  fields: Partial<Reading> = {},
  now: number = Date.now(),
): Reading {
  return Object.freeze({
    distanceMm: fields.distanceMm ?? StatusDefaults.DISTANCE_MM,
    seated: fields.seated ?? false,
    badPosture: fields.badPosture ?? false,
    alertActive: fields.alertActive ?? false,
    greenMm: fields.greenMm ?? StatusDefaults.GREEN_MM,
    redMm: fields.redMm ?? StatusDefaults.RED_MM,
    paused: fields.paused ?? false,
    timestamp: fields.timestamp ?? now,
  });
}

/** Own enumerable fields of a parsed JSON object, or null for non-objects. */
export function objectFields(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return null;
  return { ...value };
}

/**
 * Rebuild a Reading from persisted JSON (remote store or offline file).
 * Fields that are missing or of the wrong type take their defaults.
 */
export function readingFromJSON(value: unknown, now: number = Date.now()): Reading | null {
  const record = objectFields(value);
  if (!record) return null;
  const num = (key: string): number | undefined => {
    const v = record[key];
    return typeof v === "number" && Number.isFinite(v) ? v : undefined;
  };
  const bool = (key: string): boolean | undefined => {
    const v = record[key];
    return typeof v === "boolean" ? v : undefined;
  };
  return createReading(
    {
      distanceMm: num("distanceMm"),
      seated: bool("seated"),
      badPosture: bool("badPosture"),
      alertActive: bool("alertActive"),
      greenMm: num("greenMm"),
      redMm: num("redMm"),
      paused: bool("paused"),
      timestamp: num("timestamp"),
    },
    now,
  );
}

export function readingToJSON(reading: Reading): Record<string, number | boolean> {
  return {
    distanceMm: reading.distanceMm,
    seated: reading.seated,
    badPosture: reading.badPosture,
    alertActive: reading.alertActive,
    greenMm: reading.greenMm,
    redMm: reading.redMm,
    paused: reading.paused,
    timestamp: reading.timestamp,
  };
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

export function derivePostureState(reading: Reading): PostureState {
  if (reading.paused) return "correct";
  if (reading.alertActive) return "alert";
  if (reading.badPosture) return "bad";
  if (!reading.seated || reading.distanceMm === 0) return "correct";
  if (reading.distanceMm > reading.greenMm && reading.distanceMm <= reading.redMm) {
    return "warning";
  }
  return "correct";
}

export function isBadPostureState(state: PostureState): boolean {
  return state === "bad" || state === "alert";
}

export function distanceCm(reading: Reading): number {
  return Math.floor(reading.distanceMm / 10);
}

export function hasValidThresholds(greenMm: number, redMm: number): boolean {
  return greenMm >= 0 && greenMm < redMm;
}
