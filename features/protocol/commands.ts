/**
 * Outgoing firmware commands.
 *
 * Ranges mirror the firmware's own checks so an out-of-range value is
 * rejected before it reaches the radio, with the same reason text the
 * firmware would have replied with.
 */

import { CommandRanges } from "@/constants/protocol";
import { LinkError } from "@/features/errors";

export type PauseMode = "on" | "off" | "toggle";

// Firmware command types (matches the sketch's command switch)
export type DeviceCommand =
  | { type: "ping" }
  | { type: "set_green"; mm: number }
  | { type: "set_red"; mm: number }
  | { type: "set_time"; ms: number }
  | { type: "alarm"; enabled: boolean }
  | { type: "pause"; mode: PauseMode };

function checkRange(
  label: keyof typeof CommandRanges,
  value: number,
): void {
  const { min, max } = CommandRanges[label];
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new LinkError("InvalidCommand", `${label} RANGE ${min}-${max}`);
  }
}

/**
 * @throws LinkError with code InvalidCommand when a value is out of range
 */
export function validateCommand(command: DeviceCommand): void {
  switch (command.type) {
    case "set_green":
      checkRange("GREEN", command.mm);
      return;
    case "set_red":
      checkRange("RED", command.mm);
      return;
    case "set_time":
      checkRange("TIME", command.ms);
      return;
    case "ping":
    case "alarm":
    case "pause":
      return;
  }
}

export function formatCommand(command: DeviceCommand): string {
  switch (command.type) {
    case "ping":
      return "PING";
    case "set_green":
      return `SET GREEN ${command.mm}`;
    case "set_red":
      return `SET RED ${command.mm}`;
    case "set_time":
      return `SET TIME ${command.ms}`;
    case "alarm":
      return command.enabled ? "ALARM ON" : "ALARM OFF";
    case "pause":
      return `PAUSE ${command.mode.toUpperCase()}`;
  }
}
