/**
 * Link transport contract.
 *
 * A transport owns the physical connection to exactly one peer. Opening a
 * new handle implicitly closes and releases the previous one, including a
 * handle left half-open by an earlier failure.
 */

export interface PeerDescriptor {
  /** Port path or radio address used to open the link. */
  address: string;
  /** Human-readable name matched against the allow-listed patterns. */
  name: string;
}

export interface LinkHandle {
  readonly peer: PeerDescriptor;
  /**
   * Resolve with the next line (without its terminator).
   * Rejects with a StreamClosed TransportError once the stream has ended.
   */
  readLine(): Promise<string>;
  /** Rejects with a WriteFailed TransportError on a broken pipe. */
  write(data: string): Promise<void>;
  /** Idempotent and best-effort; never rejects. */
  close(): Promise<void>;
}

export interface LinkTransport {
  listPeers(): Promise<PeerDescriptor[]>;
  /** Rejects with ConnectFailed or PermissionDenied. */
  open(peer: PeerDescriptor): Promise<LinkHandle>;
  /** Close the current handle, if any. */
  close(): Promise<void>;
}

export function matchesPeerPattern(
  peer: PeerDescriptor,
  patterns: readonly string[],
): boolean {
  const name = peer.name.toLowerCase();
  return patterns.some((p) => name.includes(p.toLowerCase()));
}
