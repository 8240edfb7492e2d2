/**
 * Error taxonomy shared by every component.
 *
 * Each failure carries a literal `code` so subscribers can branch on it
 * without string matching, and components keep the last one in their state
 * as `{ code, message, timestamp }`.
 */

export type TransportErrorCode =
  | "ConnectFailed"
  | "PermissionDenied"
  | "StreamClosed"
  | "WriteFailed";

export type EnvelopeErrorCode =
  | "MalformedEnvelope"
  | "IntegrityMismatch"
  | "DecodeError";

export type LinkErrorCode = "NotConnected" | "PeerNotFound" | "InvalidCommand";

export type ErrorCode =
  | TransportErrorCode
  | EnvelopeErrorCode
  | LinkErrorCode
  | "ParseError"
  | "RemoteWriteFailed"
  | "NoActiveSession";

export interface ErrorInfo {
  code: ErrorCode;
  message: string;
  timestamp: number;
}

export type Result<T, E extends Error = PostureLinkError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export class PostureLinkError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  toInfo(timestamp: number = Date.now()): ErrorInfo {
    return { code: this.code, message: this.message, timestamp };
  }
}

export class TransportError extends PostureLinkError {
  declare readonly code: TransportErrorCode;

  constructor(code: TransportErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

export class EnvelopeError extends PostureLinkError {
  declare readonly code: EnvelopeErrorCode;

  constructor(code: EnvelopeErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

export class ParseError extends PostureLinkError {
  declare readonly code: "ParseError";
  readonly line: string;

  constructor(line: string, message: string) {
    super("ParseError", message);
    this.line = line;
  }
}

export class LinkError extends PostureLinkError {
  declare readonly code: LinkErrorCode;

  constructor(code: LinkErrorCode, message: string) {
    super(code, message);
  }
}

export class RemoteWriteError extends PostureLinkError {
  declare readonly code: "RemoteWriteFailed";

  constructor(message: string, options?: { cause?: unknown }) {
    super("RemoteWriteFailed", message, options);
  }
}

export class SessionError extends PostureLinkError {
  declare readonly code: "NoActiveSession";

  constructor(message = "No active session") {
    super("NoActiveSession", message);
  }
}

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E extends Error>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function errorMessage(error: unknown, fallback = "Unknown error"): string {
  return error instanceof Error ? error.message : fallback;
}
