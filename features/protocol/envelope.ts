/**
 * Integrity / Envelope Codec
 *
 * Wraps protocol messages with a CRC-16 suffix and an optional repeating-key
 * XOR cipher (base64 on the wire). Everything here is a pure function; the
 * two toggles travel with each call as {@link EnvelopeOptions}.
 *
 * Envelope format:
 *   plain:     BODY,CRC:1A2B
 *   encrypted: base64(xor(BODY,CRC:1A2B))
 */

import { EnvelopeConfig } from "@/constants/protocol";
import { EnvelopeError, fail, ok, type Result } from "@/features/errors";

export interface EnvelopeOptions {
  verifyCrc: boolean;
  encrypt: boolean;
}

export const PLAIN_ENVELOPE: EnvelopeOptions = { verifyCrc: false, encrypt: false };

const encoder = new TextEncoder();
const decoder = new TextDecoder();
const keyBytes = encoder.encode(EnvelopeConfig.XOR_KEY);

// ============================================================================
// CHECKSUM
// ============================================================================

/**
 * CRC-16/CCITT-FALSE over the UTF-8 bytes of `body`.
 */
export function checksum(body: string | Uint8Array): number {
  const bytes = typeof body === "string" ? encoder.encode(body) : body;
  let crc: number = EnvelopeConfig.CRC_INITIAL;
  for (let i = 0; i < bytes.length; i++) {
    crc ^= bytes[i] << 8;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 0x8000 ? (crc << 1) ^ EnvelopeConfig.CRC_POLYNOMIAL : crc << 1;
      crc &= 0xffff;
    }
  }
  return crc;
}

export function checksumHex(body: string | Uint8Array): string {
  return checksum(body).toString(16).toUpperCase().padStart(4, "0");
}

// ============================================================================
// WRAP / UNWRAP / VERIFY
// ============================================================================

export function wrap(body: string): string {
  return `${body}${EnvelopeConfig.CRC_DELIMITER}${checksumHex(body)}`;
}

export function unwrap(message: string): { body: string; claimed: string } {
  const idx = message.lastIndexOf(EnvelopeConfig.CRC_DELIMITER);
  if (idx === -1) {
    throw new EnvelopeError("MalformedEnvelope", "Missing CRC suffix");
  }
  return {
    body: message.slice(0, idx),
    claimed: message.slice(idx + EnvelopeConfig.CRC_DELIMITER.length).trim(),
  };
}

export function verify(message: string): string {
  const { body, claimed } = unwrap(message);
  const expected = checksumHex(body);
  if (claimed.toUpperCase() !== expected) {
    throw new EnvelopeError(
      "IntegrityMismatch",
      `CRC mismatch: expected ${expected}, received ${claimed}`,
    );
  }
  return body;
}

// ============================================================================
// CIPHER
// ============================================================================

function xorWithKey(bytes: Uint8Array): Uint8Array {
  const out = new Uint8Array(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    out[i] = bytes[i] ^ keyBytes[i % keyBytes.length];
  }
  return out;
}

function bytesToBase64(bytes: Uint8Array): string {
  let binary = "";
  for (let i = 0; i < bytes.length; i++) {
    binary += String.fromCharCode(bytes[i]);
  }
  return btoa(binary);
}

function base64ToBytes(encoded: string): Uint8Array {
  const raw = atob(encoded);
  const bytes = new Uint8Array(raw.length);
  for (let i = 0; i < raw.length; i++) bytes[i] = raw.charCodeAt(i);
  return bytes;
}

export function encrypt(body: string): string {
  return bytesToBase64(xorWithKey(encoder.encode(body)));
}

export function decrypt(encoded: string): string {
  let bytes: Uint8Array;
  try {
    bytes = base64ToBytes(encoded.trim());
  } catch (error) {
    throw new EnvelopeError("DecodeError", "Invalid base64 payload", { cause: error });
  }
  return decoder.decode(xorWithKey(bytes));
}

// ============================================================================
// MESSAGE PIPELINES
// ============================================================================

function asEnvelopeError(error: unknown): EnvelopeError {
  if (error instanceof EnvelopeError) return error;
  return new EnvelopeError("DecodeError", "Envelope processing failed", { cause: error });
}

/**
 * Decrypt (optionally), verify the checksum and strip the envelope.
 */
export function processIncoming(
  message: string,
  encryptionEnabled: boolean,
): Result<string, EnvelopeError> {
  try {
    const plain = encryptionEnabled ? decrypt(message) : message;
    return ok(verify(plain));
  } catch (error) {
    return fail(asEnvelopeError(error));
  }
}

/**
 * Wrap with a checksum, then encrypt (optionally).
 */
export function prepareOutgoing(message: string, encryptionEnabled: boolean): string {
  const wrapped = wrap(message);
  return encryptionEnabled ? encrypt(wrapped) : wrapped;
}

/**
 * Apply the receive side of the envelope with each toggle taken independently.
 */
export function decodeIncomingLine(
  line: string,
  options: EnvelopeOptions,
): Result<string, EnvelopeError> {
  if (options.verifyCrc) return processIncoming(line, options.encrypt);
  if (!options.encrypt) return ok(line);
  try {
    return ok(decrypt(line));
  } catch (error) {
    return fail(asEnvelopeError(error));
  }
}

/**
 * Apply the send side of the envelope and terminate the line.
 */
export function encodeOutgoingLine(body: string, options: EnvelopeOptions): string {
  if (options.verifyCrc) return `${prepareOutgoing(body, options.encrypt)}\n`;
  return `${options.encrypt ? encrypt(body) : body}\n`;
}
