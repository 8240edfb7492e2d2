/**
 * File-backed FIFO of readings that could not be written to the remote store.
 *
 * The file holds a JSON array, oldest first. Every read-modify-write runs
 * inside one critical section (a promise chain), so concurrent enqueue,
 * peek and dropFirst calls never interleave. A missing, empty or corrupt
 * file reads as an empty queue.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import { Config } from "@/constants/timing";
import { errorMessage } from "@/features/errors";
import { readingFromJSON, readingToJSON, type Reading } from "@/features/posture/reading";

const TAG = "[Buffer]";

export const DEFAULT_BUFFER_FILE = "offline_posture_buffer.json";

export interface OfflineBufferOptions {
  filePath: string;
  capacity?: number;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function sameReading(a: Reading, b: Reading): boolean {
  return JSON.stringify(readingToJSON(a)) === JSON.stringify(readingToJSON(b));
}

/**
 * Length of the head of `entries` that matches a tail of `sent`
 * (the head of `sent` may already have been evicted).
 */
function confirmedPrefix(entries: readonly Reading[], sent: readonly Reading[]): number {
  for (let start = 0; start < sent.length; start++) {
    const expected = sent.slice(start);
    if (expected.length > entries.length) continue;
    if (expected.every((reading, i) => sameReading(reading, entries[i]))) {
      return expected.length;
    }
  }
  return 0;
}

export class OfflineReadingBuffer {
  readonly filePath: string;
  readonly capacity: number;

  // Critical section: each operation waits for the previous one
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: OfflineBufferOptions) {
    this.filePath = options.filePath;
    this.capacity = options.capacity ?? Config.OFFLINE_BUFFER_CAPACITY;
  }

  /**
   * Append a reading, evicting the oldest beyond capacity.
   * Resolves to the resulting size.
   */
  enqueue(reading: Reading): Promise<number> {
    return this.exclusive(async () => {
      const entries = await this.readEntries();
      entries.push(reading);
      const overflow = entries.length - this.capacity;
      if (overflow > 0) {
        entries.splice(0, overflow);
        this.log(`Capacity ${this.capacity} reached, dropped ${overflow} oldest`);
      }
      await this.writeEntries(entries);
      return entries.length;
    });
  }

  /** Up to `maxItems` readings, oldest first, without removing them. */
  peek(maxItems: number = Config.OFFLINE_DRAIN_BATCH): Promise<Reading[]> {
    return this.exclusive(async () => {
      const entries = await this.readEntries();
      return entries.slice(0, Math.max(0, maxItems));
    });
  }

  /** Remove the `count` oldest readings. */
  dropFirst(count: number): Promise<void> {
    return this.exclusive(async () => {
      if (count <= 0) return;
      const entries = await this.readEntries();
      if (entries.length === 0) return;
      await this.writeEntries(entries.slice(count));
    });
  }

  /**
   * Remove the leading readings that belong to `sent`, a batch previously
   * returned by {@link peek} and written upstream. Entries evicted since the
   * peek are skipped, and nothing past the first mismatch is touched.
   * Resolves to the number removed.
   */
  dropConfirmed(sent: readonly Reading[]): Promise<number> {
    return this.exclusive(async () => {
      if (sent.length === 0) return 0;
      const entries = await this.readEntries();
      const count = confirmedPrefix(entries, sent);
      if (count === 0) return 0;
      await this.writeEntries(entries.slice(count));
      return count;
    });
  }

  size(): Promise<number> {
    return this.exclusive(async () => (await this.readEntries()).length);
  }

  clear(): Promise<void> {
    return this.exclusive(() => this.writeEntries([]));
  }

  // ============================================================================
  // FILE ACCESS
  // ============================================================================

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async readEntries(): Promise<Reading[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
    if (text.trim().length === 0) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      console.warn(`${TAG} Corrupt buffer file, starting empty: ${errorMessage(error)}`);
      return [];
    }
    if (!Array.isArray(parsed)) {
      console.warn(`${TAG} Buffer file is not an array, starting empty`);
      return [];
    }

    const entries: Reading[] = [];
    for (const item of parsed) {
      const reading = readingFromJSON(item);
      if (reading) entries.push(reading);
    }
    return entries;
  }

  private async writeEntries(entries: Reading[]): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    // Write-then-rename keeps the previous file intact if the process dies mid-write
    const tmp = `${this.filePath}.tmp`;
    await writeFile(tmp, JSON.stringify(entries.map(readingToJSON)), "utf8");
    await rename(tmp, this.filePath);
  }

  private log(message: string): void {
    console.log(`${TAG} ${message}`);
  }
}
