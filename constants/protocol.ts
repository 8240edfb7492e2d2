/**
 * Wire Protocol Configuration
 *
 * Constants shared with the sensor firmware. Status lines, command ranges
 * and the envelope key must match what the microcontroller sketch expects.
 */

// ============================================================================
// ENVELOPE
// ============================================================================

export const EnvelopeConfig = {
  /**
   * Separator between a message body and its checksum: `BODY,CRC:XXXX`.
   */
  CRC_DELIMITER: ",CRC:",

  /**
   * Shared repeating XOR key. Both peers hold the same value.
   */
  XOR_KEY: "ESP4LD4APP2024K3Y",

  /**
   * CRC-16/CCITT-FALSE parameters.
   */
  CRC_INITIAL: 0xffff,
  CRC_POLYNOMIAL: 0x1021,
} as const;

// ============================================================================
// STATUS LINE DEFAULTS
// ============================================================================

export const StatusDefaults = {
  /** Distance in mm when DIST is missing (0 = no valid echo). */
  DISTANCE_MM: 0,

  /** Upper bound of the correct zone in mm. */
  GREEN_MM: 80,

  /** Upper bound of the warning zone in mm. */
  RED_MM: 120,
} as const;

// ============================================================================
// COMMAND RANGES (enforced by firmware, mirrored here)
// ============================================================================

export const CommandRanges = {
  GREEN: { min: 60, max: 200 },
  RED: { min: 80, max: 400 },
  TIME: { min: 5_000, max: 300_000 },
} as const;

// ============================================================================
// SERIAL LINK
// ============================================================================

export const SerialConfig = {
  /**
   * HC-05/HC-06 modules ship configured for 9600 baud.
   */
  BAUD_RATE: 9600,

  /**
   * Peer names accepted by default discovery (case-insensitive substring).
   */
  PEER_NAME_PATTERNS: ["HC-06", "HC-05"],

  /**
   * Fallback label for a peer whose port reports no descriptive fields.
   */
  UNKNOWN_PEER_NAME: "Serial device",
} as const;
