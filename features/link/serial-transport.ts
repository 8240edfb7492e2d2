/**
 * Serial link transport.
 *
 * A paired HC-05/HC-06 radio is exposed by the OS as a serial device
 * (`/dev/rfcomm0`, `/dev/tty.HC-06-DevB`, `COM5`). Lines are split by the
 * serialport ReadlineParser and handed to the reader through a LineQueue.
 */

import { ReadlineParser, SerialPort } from "serialport";

import { SerialConfig } from "@/constants/protocol";
import { TransportError, errorMessage } from "@/features/errors";
import { LineQueue } from "./line-queue";
import type { LinkHandle, LinkTransport, PeerDescriptor } from "./transport";

const TAG = "[Serial]";

export interface SerialTransportOptions {
  baudRate?: number;
  /**
   * Peers that are always offered by `listPeers()`, e.g. an rfcomm device
   * bound outside the OS port enumeration.
   */
  pinnedPeers?: PeerDescriptor[];
}

function isPermissionError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if ("code" in error && (error.code === "EACCES" || error.code === "EPERM")) {
    return true;
  }
  return /permission denied|access denied/i.test(error.message);
}

class SerialLinkHandle implements LinkHandle {
  private readonly lines = new LineQueue();
  private released = false;

  constructor(
    readonly peer: PeerDescriptor,
    private readonly port: SerialPort,
    private readonly parser: ReadlineParser,
  ) {
    this.parser.on("data", this.handleData);
    this.port.on("close", this.handleClose);
    this.port.on("error", this.handleError);
  }

  readLine(): Promise<string> {
    return this.lines.next();
  }

  write(data: string): Promise<void> {
    if (this.released || !this.port.isOpen) {
      return Promise.reject(new TransportError("WriteFailed", "Port is not open"));
    }
    return new Promise<void>((resolve, reject) => {
      this.port.write(data, (writeErr) => {
        if (writeErr) {
          reject(new TransportError("WriteFailed", writeErr.message, { cause: writeErr }));
          return;
        }
        this.port.drain((drainErr) => {
          if (drainErr) {
            reject(new TransportError("WriteFailed", drainErr.message, { cause: drainErr }));
          } else {
            resolve();
          }
        });
      });
    });
  }

  async close(): Promise<void> {
    if (this.released) return;
    this.released = true;

    // Reader first, then input side, output side and the port itself.
    this.guard("reader", () => {
      this.lines.close(new TransportError("StreamClosed", "Link closed"));
      this.parser.off("data", this.handleData);
    });
    this.guard("input", () => {
      this.port.unpipe(this.parser);
      this.parser.destroy();
    });
    await this.guardAsync("output", () =>
      new Promise<void>((resolve, reject) => {
        if (!this.port.isOpen) return resolve();
        this.port.drain((err) => (err ? reject(err) : resolve()));
      }),
    );
    await this.guardAsync("port", () =>
      new Promise<void>((resolve, reject) => {
        this.port.off("close", this.handleClose);
        if (!this.port.isOpen) return resolve();
        this.port.close((err) => (err ? reject(err) : resolve()));
      }),
    );
    this.port.off("error", this.handleError);
  }

  private handleData = (chunk: string | Buffer): void => {
    const line = typeof chunk === "string" ? chunk : chunk.toString("utf8");
    this.lines.push(line.replace(/\r$/, ""));
  };

  private handleClose = (): void => {
    this.lines.close(new TransportError("StreamClosed", "Stream closed"));
  };

  private handleError = (err: Error): void => {
    console.warn(`${TAG} Port error on ${this.peer.address}:`, err.message);
    this.lines.close(new TransportError("StreamClosed", err.message, { cause: err }));
  };

  private guard(step: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      console.warn(`${TAG} close(${step}) failed: ${errorMessage(err)}`);
    }
  }

  private async guardAsync(step: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      console.warn(`${TAG} close(${step}) failed: ${errorMessage(err)}`);
    }
  }
}

export class SerialLinkTransport implements LinkTransport {
  private readonly baudRate: number;
  private readonly pinnedPeers: PeerDescriptor[];
  private current: SerialLinkHandle | null = null;

  constructor(options: SerialTransportOptions = {}) {
    this.baudRate = options.baudRate ?? SerialConfig.BAUD_RATE;
    this.pinnedPeers = options.pinnedPeers ?? [];
  }

  async listPeers(): Promise<PeerDescriptor[]> {
    let ports: Awaited<ReturnType<typeof SerialPort.list>>;
    try {
      ports = await SerialPort.list();
    } catch (err) {
      if (isPermissionError(err)) {
        throw new TransportError("PermissionDenied", errorMessage(err), { cause: err });
      }
      throw new TransportError("ConnectFailed", errorMessage(err), { cause: err });
    }
    const listed: PeerDescriptor[] = ports.map((p) => ({
      address: p.path,
      name: p.manufacturer || p.pnpId || p.path || SerialConfig.UNKNOWN_PEER_NAME,
    }));
    const pinned = this.pinnedPeers.filter(
      (pin) => !listed.some((p) => p.address === pin.address),
    );
    return [...pinned, ...listed];
  }

  async open(peer: PeerDescriptor): Promise<LinkHandle> {
    await this.close();

    const port = new SerialPort({
      path: peer.address,
      baudRate: this.baudRate,
      autoOpen: false,
    });
    try {
      await new Promise<void>((resolve, reject) => {
        port.open((err) => (err ? reject(err) : resolve()));
      });
    } catch (err) {
      const code = isPermissionError(err) ? "PermissionDenied" : "ConnectFailed";
      throw new TransportError(code, errorMessage(err, "Open failed"), { cause: err });
    }

    const parser = port.pipe(new ReadlineParser({ delimiter: "\n", encoding: "utf8" }));
    this.current = new SerialLinkHandle(peer, port, parser);
    console.log(`${TAG} Opened ${peer.address} @ ${this.baudRate} baud`);
    return this.current;
  }

  async close(): Promise<void> {
    const handle = this.current;
    this.current = null;
    if (handle) await handle.close();
  }
}
