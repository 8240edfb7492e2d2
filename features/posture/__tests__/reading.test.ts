import { describe, it, expect } from "vitest";
import {
  createReading,
  derivePostureState,
  distanceCm,
  hasValidThresholds,
  objectFields,
  readingFromJSON,
  readingToJSON,
} from "../reading";

const seated = (distanceMm: number, extra: Parameters<typeof createReading>[0] = {}) =>
  createReading({ distanceMm, seated: true, greenMm: 80, redMm: 120, ...extra }, 0);

describe("derivePostureState precedence", () => {
  it("paused always yields correct", () => {
    expect(derivePostureState(seated(300, { paused: true, alertActive: true, badPosture: true }))).toBe(
      "correct",
    );
  });

  it("a sustained alert wins over the distance zone", () => {
    expect(derivePostureState(seated(50, { alertActive: true }))).toBe("alert");
  });

  it("the bad-posture flag wins over the distance zone", () => {
    expect(derivePostureState(seated(50, { badPosture: true }))).toBe("bad");
  });

  it("not seated or no echo is correct", () => {
    expect(derivePostureState(createReading({ distanceMm: 100, seated: false }, 0))).toBe("correct");
    expect(derivePostureState(seated(0))).toBe("correct");
  });
});

describe("derivePostureState zones", () => {
  it("distance equal to green is correct", () => {
    expect(derivePostureState(seated(80))).toBe("correct");
  });

  it("green+1 through red is warning", () => {
    expect(derivePostureState(seated(81))).toBe("warning");
    expect(derivePostureState(seated(120))).toBe("warning");
  });

  it("beyond red follows the device flag", () => {
    expect(derivePostureState(seated(121, { badPosture: true }))).toBe("bad");
    expect(derivePostureState(seated(121))).toBe("correct");
  });
});

describe("reading JSON", () => {
  it("round-trips through the stored shape", () => {
    const reading = seated(150, { badPosture: true, timestamp: 1234 });
    expect(readingFromJSON(readingToJSON(reading))).toEqual(reading);
  });

  it("applies defaults for missing or mistyped fields", () => {
    const reading = readingFromJSON({ distanceMm: "x", seated: 1 }, 99);
    expect(reading).toEqual({
      distanceMm: 0,
      seated: false,
      badPosture: false,
      alertActive: false,
      greenMm: 80,
      redMm: 120,
      paused: false,
      timestamp: 99,
    });
  });

  it("returns null for non-objects", () => {
    expect(readingFromJSON(null)).toBeNull();
    expect(readingFromJSON("DIST:1")).toBeNull();
    expect(objectFields([1, 2])).toBeNull();
  });
});

describe("helpers", () => {
  it("distanceCm floors to whole centimetres", () => {
    expect(distanceCm(seated(157))).toBe(15);
  });

  it("hasValidThresholds requires 0 <= green < red", () => {
    expect(hasValidThresholds(80, 120)).toBe(true);
    expect(hasValidThresholds(120, 120)).toBe(false);
    expect(hasValidThresholds(-1, 120)).toBe(false);
  });

  it("createReading freezes the result", () => {
    expect(Object.isFrozen(seated(10))).toBe(true);
  });
});
