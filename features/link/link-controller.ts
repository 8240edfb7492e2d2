/**
 * Connection lifecycle controller for the posture sensor link.
 *
 * Owns the transport handle, the continuous read task and the connection
 * state (single writer). Incoming lines go through the envelope codec (when
 * enabled) and the status parser; decoded readings and device replies are
 * republished to subscribers in arrival order.
 *
 * The controller never retries on its own: a dropped link ends in
 * "disconnected" with cause "lost" and the owner decides whether to call
 * `reconnect()`.
 */

import { SerialConfig } from "@/constants/protocol";
import {
  LinkError,
  ParseError,
  PostureLinkError,
  TransportError,
  errorMessage,
  fail,
  ok,
  type ErrorInfo,
  type Result,
  type TransportErrorCode,
} from "@/features/errors";
import type { Reading } from "@/features/posture/reading";
import {
  formatCommand,
  validateCommand,
  type DeviceCommand,
  type PauseMode,
} from "@/features/protocol/commands";
import {
  PLAIN_ENVELOPE,
  decodeIncomingLine,
  encodeOutgoingLine,
  type EnvelopeOptions,
} from "@/features/protocol/envelope";
import { classifyLine, type IncomingLine } from "@/features/protocol/status-line";
import { EventHub, type EventListener, type Unsubscribe } from "@/features/state/event-hub";
import {
  matchesPeerPattern,
  type LinkHandle,
  type LinkTransport,
  type PeerDescriptor,
} from "./transport";

const TAG = "[Link]";

// ============================================================================
// TYPES
// ============================================================================

export type ConnectionState = "disconnected" | "connecting" | "connected";

/**
 * Why the link went to "disconnected": a user request, an involuntary drop
 * (read/write failure, stale data), a failed open, or a new connect()
 * replacing the current link.
 */
export type DisconnectCause = "manual" | "lost" | "failed" | "replaced";

export interface LinkState {
  connectionState: ConnectionState;
  peer: PeerDescriptor | null;
  lastPeer: PeerDescriptor | null;
  latestReading: Reading | null;
  lastReadingAt: number | null;
  lastError: ErrorInfo | null;
}

export type LinkEvent =
  | {
      type: "connectionStateChanged";
      state: ConnectionState;
      peer?: PeerDescriptor;
      cause?: DisconnectCause;
      reason?: string;
    }
  | { type: "reading"; reading: Reading }
  | { type: "pong" }
  | { type: "ack"; echo: string }
  | { type: "deviceError"; reason: string }
  | { type: "lineRejected"; line: string; error: ErrorInfo }
  | { type: "error"; error: ErrorInfo };

export interface LinkControllerOptions {
  transport: LinkTransport;
  envelope?: EnvelopeOptions;
  peerNamePatterns?: readonly string[];
  clock?: () => number;
}

function asTransportError(error: unknown, fallback: TransportErrorCode): TransportError {
  if (error instanceof TransportError) return error;
  return new TransportError(fallback, errorMessage(error), { cause: error });
}

const noop = (): void => undefined;

// ============================================================================
// LINK CONTROLLER
// ============================================================================

export class LinkController {
  private readonly transport: LinkTransport;
  private readonly envelope: EnvelopeOptions;
  private readonly peerPatterns: readonly string[];
  private readonly clock: () => number;
  private readonly events = new EventHub<LinkEvent>(TAG);

  private handle: LinkHandle | null = null;
  private readTask: Promise<void> | null = null;
  // Bumped on every teardown; a read task or an in-flight open belonging to
  // an older generation discards its result.
  private generation = 0;
  private manualDisconnect = false;

  // Write serialization: only one line is written at a time
  private writeQueue: Promise<void> = Promise.resolve();

  private state: LinkState = {
    connectionState: "disconnected",
    peer: null,
    lastPeer: null,
    latestReading: null,
    lastReadingAt: null,
    lastError: null,
  };

  constructor(options: LinkControllerOptions) {
    this.transport = options.transport;
    this.envelope = options.envelope ?? PLAIN_ENVELOPE;
    this.peerPatterns = options.peerNamePatterns ?? SerialConfig.PEER_NAME_PATTERNS;
    this.clock = options.clock ?? (() => Date.now());
  }

  // ============================================================================
  // STATE ACCESS
  // ============================================================================

  getState(): LinkState {
    return { ...this.state };
  }

  addEventListener(listener: EventListener<LinkEvent>): Unsubscribe {
    return this.events.subscribe(listener);
  }

  isConnected(): boolean {
    return this.state.connectionState === "connected" && this.handle !== null;
  }

  isManualDisconnect(): boolean {
    return this.manualDisconnect;
  }

  // ============================================================================
  // DISCOVERY
  // ============================================================================

  async listPaired(): Promise<PeerDescriptor[]> {
    try {
      return await this.transport.listPeers();
    } catch (error) {
      this.handleError(asTransportError(error, "ConnectFailed"));
      return [];
    }
  }

  async findDefaultPeer(): Promise<PeerDescriptor | undefined> {
    const peers = await this.listPaired();
    const peer = peers.find((p) => matchesPeerPattern(p, this.peerPatterns));
    if (!peer) {
      this.log(`No default peer among: [${peers.map((p) => p.name).join(", ")}]`);
    }
    return peer;
  }

  // ============================================================================
  // CONNECTION
  // ============================================================================

  async connect(peer: PeerDescriptor): Promise<Result<void>> {
    this.manualDisconnect = false;
    if (this.state.connectionState !== "disconnected") {
      await this.teardown("replaced", null);
    } else {
      await this.closeResources();
    }

    const generation = ++this.generation;
    this.state.lastError = null;
    this.setConnectionState("connecting", { peer });
    this.log(`Connecting to ${peer.name} (${peer.address})...`);

    let handle: LinkHandle;
    try {
      handle = await this.transport.open(peer);
    } catch (error) {
      const err = asTransportError(error, "ConnectFailed");
      if (generation === this.generation) {
        await this.teardown("failed", err, `Connection error: ${err.message}`);
      }
      return fail(err);
    }

    if (generation !== this.generation) {
      this.log(`Connection to ${peer.address} superseded, releasing`);
      await handle.close();
      return fail(new LinkError("NotConnected", "Connection attempt was cancelled"));
    }

    this.handle = handle;
    this.state.lastPeer = peer;
    this.setConnectionState("connected", { peer });
    this.log(`Connected to ${peer.name}`);

    this.readTask = this.readLoop(handle, generation);
    return this.sendCommand({ type: "ping" });
  }

  /**
   * User-initiated disconnect. No auto-reconnect should follow it.
   */
  async disconnect(): Promise<void> {
    this.manualDisconnect = true;
    this.log("Disconnecting...");
    await this.teardown("manual", null);
  }

  /**
   * Involuntary teardown, e.g. when the watchdog sees a silent stall.
   */
  async drop(reason: string): Promise<void> {
    if (this.state.connectionState === "disconnected") return;
    this.log(`Dropping link: ${reason}`);
    await this.teardown("lost", new TransportError("StreamClosed", reason), reason);
  }

  /**
   * Re-resolve the last peer (falling back to discovery) and connect to it.
   */
  async reconnect(): Promise<Result<void>> {
    const peers = await this.listPaired();
    const last = this.state.lastPeer;
    const peer =
      (last ? peers.find((p) => p.address === last.address) : undefined) ??
      peers.find((p) => matchesPeerPattern(p, this.peerPatterns));

    if (!peer) {
      const err = new LinkError("PeerNotFound", "Sensor not found (not paired)");
      this.handleError(err);
      return fail(err);
    }
    return this.connect(peer);
  }

  async destroy(): Promise<void> {
    await this.disconnect();
    this.events.clear();
    this.log("Destroyed");
  }

  // ============================================================================
  // COMMAND SENDING
  // ============================================================================

  async sendCommand(command: DeviceCommand): Promise<Result<void>> {
    try {
      validateCommand(command);
    } catch (error) {
      if (error instanceof LinkError) return fail(error);
      throw error;
    }

    const handle = this.handle;
    if (this.state.connectionState !== "connected" || handle === null) {
      return fail(new LinkError("NotConnected", "Not connected"));
    }

    const body = formatCommand(command);
    try {
      await this.enqueueWrite(handle, encodeOutgoingLine(body, this.envelope));
    } catch (error) {
      const err = asTransportError(error, "WriteFailed");
      this.log(`Write failed for "${body}": ${err.message}`);
      if (handle === this.handle) {
        await this.teardown("lost", err, "Connection lost");
      }
      return fail(err);
    }

    this.log(`TX ${body}${this.envelope.verifyCrc ? " (with CRC)" : ""}`);
    return ok(undefined);
  }

  ping(): Promise<Result<void>> {
    return this.sendCommand({ type: "ping" });
  }

  setGreenThreshold(mm: number): Promise<Result<void>> {
    return this.sendCommand({ type: "set_green", mm });
  }

  setRedThreshold(mm: number): Promise<Result<void>> {
    return this.sendCommand({ type: "set_red", mm });
  }

  setTimeThreshold(ms: number): Promise<Result<void>> {
    return this.sendCommand({ type: "set_time", ms });
  }

  setAlarm(enabled: boolean): Promise<Result<void>> {
    return this.sendCommand({ type: "alarm", enabled });
  }

  setPause(mode: PauseMode): Promise<Result<void>> {
    return this.sendCommand({ type: "pause", mode });
  }

  private enqueueWrite(handle: LinkHandle, line: string): Promise<void> {
    const write = this.writeQueue.then(() => handle.write(line));
    // The chain only orders writes; failures reach the caller through `write`.
    this.writeQueue = write.then(noop, noop);
    return write;
  }

  // ============================================================================
  // INCOMING DATA
  // ============================================================================

  private async readLoop(handle: LinkHandle, generation: number): Promise<void> {
    while (generation === this.generation) {
      let line: string;
      try {
        line = await handle.readLine();
      } catch (error) {
        if (generation !== this.generation) return;
        const err = asTransportError(error, "StreamClosed");
        this.log(`Read error: ${err.message}`);
        // This task is finishing; teardown must not wait on it.
        this.readTask = null;
        await this.teardown("lost", err, "Connection lost");
        return;
      }
      if (generation !== this.generation) return;
      this.processLine(line);
    }
  }

  private processLine(raw: string): void {
    const line = raw.trim();
    if (line.length === 0) return;
    const now = this.clock();

    const decoded = decodeIncomingLine(line, this.envelope);
    if (!decoded.ok) {
      this.rejectLine(line, decoded.error, now);
      return;
    }

    let incoming: IncomingLine;
    try {
      incoming = classifyLine(decoded.value, now);
    } catch (error) {
      if (error instanceof ParseError) {
        this.rejectLine(line, error, now);
        return;
      }
      throw error;
    }

    switch (incoming.kind) {
      case "status":
        this.state.latestReading = incoming.reading;
        this.state.lastReadingAt = now;
        this.emit({ type: "reading", reading: incoming.reading });
        break;
      case "pong":
        this.log("PONG received, link verified");
        this.emit({ type: "pong" });
        break;
      case "ack":
        this.log(`Device OK: ${incoming.echo}`);
        this.emit({ type: "ack", echo: incoming.echo });
        break;
      case "deviceError":
        this.log(`Device ERR: ${incoming.reason}`);
        this.emit({ type: "deviceError", reason: incoming.reason });
        break;
    }
  }

  private rejectLine(line: string, error: PostureLinkError, now: number): void {
    this.log(`Discarding line (${error.code}): ${line.substring(0, 120)}`);
    this.emit({ type: "lineRejected", line, error: error.toInfo(now) });
  }

  // ============================================================================
  // TEARDOWN
  // ============================================================================

  private async teardown(
    cause: DisconnectCause,
    error: PostureLinkError | null,
    reason?: string,
  ): Promise<void> {
    await this.closeResources();
    const wasDisconnected = this.state.connectionState === "disconnected";
    this.state.latestReading = null;
    this.state.peer = null;
    if (error) this.handleError(error, reason);
    if (!wasDisconnected) {
      this.setConnectionState("disconnected", { cause, reason });
      this.log(reason ? `Disconnected: ${reason}` : "Disconnected");
    }
  }

  /**
   * Release the read task, then the handle (input, output, port). Also
   * closes whatever the transport still holds from an earlier failure.
   */
  private async closeResources(): Promise<void> {
    this.generation++;
    const handle = this.handle;
    const task = this.readTask;
    this.handle = null;
    this.readTask = null;
    if (handle) await handle.close();
    await this.transport.close();
    if (task) await task;
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private setConnectionState(
    state: ConnectionState,
    details: { peer?: PeerDescriptor; cause?: DisconnectCause; reason?: string },
  ): void {
    this.state.connectionState = state;
    if (state !== "disconnected") this.state.peer = details.peer ?? null;
    this.emit({ type: "connectionStateChanged", state, ...details });
  }

  private handleError(error: PostureLinkError, message?: string): void {
    const info: ErrorInfo = {
      code: error.code,
      message: message ?? error.message,
      timestamp: this.clock(),
    };
    this.state.lastError = info;
    this.emit({ type: "error", error: info });
    this.log(`Error: ${info.code}: ${info.message}`);
  }

  private emit(event: LinkEvent): void {
    this.events.emit(event);
  }

  private log(message: string): void {
    console.log(`${TAG} ${message}`);
  }
}
