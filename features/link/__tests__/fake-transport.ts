import { TransportError } from "@/features/errors";
import { LineQueue } from "../line-queue";
import type { LinkHandle, LinkTransport, PeerDescriptor } from "../transport";

export class FakeLinkHandle implements LinkHandle {
  readonly written: string[] = [];
  closed = false;
  failWrites = false;
  private readonly lines = new LineQueue();

  constructor(readonly peer: PeerDescriptor) {}

  readLine(): Promise<string> {
    return this.lines.next();
  }

  async write(data: string): Promise<void> {
    if (this.failWrites || this.closed) {
      throw new TransportError("WriteFailed", "Broken pipe");
    }
    this.written.push(data);
  }

  async close(): Promise<void> {
    this.closed = true;
    this.lines.close(new TransportError("StreamClosed", "Link closed"));
  }

  /** Simulate a line arriving from the sensor. */
  receive(line: string): void {
    this.lines.push(line);
  }

  /** Simulate the remote end going away. */
  hangUp(): void {
    this.lines.close(new TransportError("StreamClosed", "Stream closed"));
  }
}

export class FakeLinkTransport implements LinkTransport {
  peers: PeerDescriptor[] = [];
  readonly handles: FakeLinkHandle[] = [];
  openFailure: Error | null = null;
  private current: FakeLinkHandle | null = null;

  async listPeers(): Promise<PeerDescriptor[]> {
    return [...this.peers];
  }

  async open(peer: PeerDescriptor): Promise<LinkHandle> {
    await this.close();
    if (this.openFailure) throw this.openFailure;
    const handle = new FakeLinkHandle(peer);
    this.handles.push(handle);
    this.current = handle;
    return handle;
  }

  async close(): Promise<void> {
    const handle = this.current;
    this.current = null;
    if (handle) await handle.close();
  }

  get last(): FakeLinkHandle {
    const handle = this.handles[this.handles.length - 1];
    if (!handle) throw new Error("No handle opened");
    return handle;
  }
}

/** Let pending promise callbacks (the read loop) run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
