import { describe, it, expect } from "vitest";
import { LinkError } from "@/features/errors";
import { formatCommand, validateCommand, type DeviceCommand } from "../commands";

function rejection(command: DeviceCommand): string | null {
  try {
    validateCommand(command);
    return null;
  } catch (error) {
    if (error instanceof LinkError) return `${error.code}: ${error.message}`;
    throw error;
  }
}

describe("formatCommand", () => {
  it("formats every command", () => {
    expect(formatCommand({ type: "ping" })).toBe("PING");
    expect(formatCommand({ type: "set_green", mm: 90 })).toBe("SET GREEN 90");
    expect(formatCommand({ type: "set_red", mm: 150 })).toBe("SET RED 150");
    expect(formatCommand({ type: "set_time", ms: 10_000 })).toBe("SET TIME 10000");
    expect(formatCommand({ type: "alarm", enabled: true })).toBe("ALARM ON");
    expect(formatCommand({ type: "alarm", enabled: false })).toBe("ALARM OFF");
    expect(formatCommand({ type: "pause", mode: "on" })).toBe("PAUSE ON");
    expect(formatCommand({ type: "pause", mode: "off" })).toBe("PAUSE OFF");
    expect(formatCommand({ type: "pause", mode: "toggle" })).toBe("PAUSE TOGGLE");
  });
});

describe("validateCommand", () => {
  it("accepts the range bounds", () => {
    expect(rejection({ type: "set_green", mm: 60 })).toBeNull();
    expect(rejection({ type: "set_green", mm: 200 })).toBeNull();
    expect(rejection({ type: "set_red", mm: 80 })).toBeNull();
    expect(rejection({ type: "set_red", mm: 400 })).toBeNull();
    expect(rejection({ type: "set_time", ms: 5_000 })).toBeNull();
    expect(rejection({ type: "set_time", ms: 300_000 })).toBeNull();
  });

  it("rejects values outside the firmware ranges with its reason text", () => {
    expect(rejection({ type: "set_green", mm: 59 })).toBe("InvalidCommand: GREEN RANGE 60-200");
    expect(rejection({ type: "set_green", mm: 201 })).toBe("InvalidCommand: GREEN RANGE 60-200");
    expect(rejection({ type: "set_red", mm: 401 })).toBe("InvalidCommand: RED RANGE 80-400");
    expect(rejection({ type: "set_time", ms: 4_999 })).toBe(
      "InvalidCommand: TIME RANGE 5000-300000",
    );
  });

  it("rejects non-integer values", () => {
    expect(rejection({ type: "set_green", mm: 90.5 })).toBe("InvalidCommand: GREEN RANGE 60-200");
  });

  it("accepts commands without arguments", () => {
    expect(rejection({ type: "ping" })).toBeNull();
    expect(rejection({ type: "pause", mode: "toggle" })).toBeNull();
  });
});
