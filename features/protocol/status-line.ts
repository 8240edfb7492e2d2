/**
 * Status Line Parser
 *
 * Decodes the firmware's status report and the control replies that share
 * the same line stream.
 *
 * Status format (order-insensitive, unknown keys ignored):
 *   DIST:<mm>,SENT:<0|1>,BAD:<0|1>,ALR:<0|1>,GREEN:<mm>,RED:<mm>[,PAUS:<0|1>]
 *
 * Replies:
 *   PONG            liveness
 *   OK <ECHO>       command accepted
 *   ERR <REASON>    command rejected (e.g. "ERR GREEN RANGE 60-200", "ERR CMD")
 */

import { StatusDefaults } from "@/constants/protocol";
import { ParseError } from "@/features/errors";
import { createReading, type Reading } from "@/features/posture/reading";

export type IncomingLine =
  | { kind: "status"; reading: Reading }
  | { kind: "pong" }
  | { kind: "ack"; echo: string }
  | { kind: "deviceError"; reason: string };

const INT_PATTERN = /^-?\d+$/;

function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined || !INT_PATTERN.test(value)) return fallback;
  return Number.parseInt(value, 10);
}

function splitTokens(line: string): Map<string, string> {
  const fields = new Map<string, string>();
  for (const token of line.split(",")) {
    const sep = token.indexOf(":");
    if (sep === -1) {
      throw new ParseError(line, `Token without delimiter: "${token}"`);
    }
    const key = token.slice(0, sep).trim();
    if (key.length === 0) {
      throw new ParseError(line, `Token without key: "${token}"`);
    }
    const rest = token.slice(sep + 1);
    const nextSep = rest.indexOf(":");
    fields.set(key, (nextSep === -1 ? rest : rest.slice(0, nextSep)).trim());
  }
  return fields;
}

/**
 * Parse one trimmed status line into a Reading.
 *
 * @throws ParseError when the line does not follow the KEY:VALUE grammar
 */
export function parseStatusLine(line: string, now: number = Date.now()): Reading {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    throw new ParseError(line, "Empty line");
  }
  const fields = splitTokens(trimmed);
  return createReading(
    {
      distanceMm: parseIntOr(fields.get("DIST"), StatusDefaults.DISTANCE_MM),
      seated: fields.get("SENT") === "1",
      badPosture: fields.get("BAD") === "1",
      alertActive: fields.get("ALR") === "1",
      greenMm: parseIntOr(fields.get("GREEN"), StatusDefaults.GREEN_MM),
      redMm: parseIntOr(fields.get("RED"), StatusDefaults.RED_MM),
      paused: fields.get("PAUS") === "1",
    },
    now,
  );
}

/**
 * Route a decoded line to either a control reply or a status reading.
 *
 * @throws ParseError for lines that are neither
 */
export function classifyLine(line: string, now: number = Date.now()): IncomingLine {
  const trimmed = line.trim();
  if (trimmed === "PONG") return { kind: "pong" };
  if (trimmed === "OK" || trimmed.startsWith("OK ")) {
    return { kind: "ack", echo: trimmed.slice(2).trim() };
  }
  if (trimmed === "ERR" || trimmed.startsWith("ERR ")) {
    return { kind: "deviceError", reason: trimmed.slice(3).trim() };
  }
  return { kind: "status", reading: parseStatusLine(trimmed, now) };
}
