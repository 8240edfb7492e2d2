import { describe, it, expect } from "vitest";
import { LineQueue } from "../line-queue";

describe("LineQueue", () => {
  it("delivers buffered lines in arrival order", async () => {
    const q = new LineQueue();
    q.push("a");
    q.push("b");
    expect(q.pending).toBe(2);
    expect(await q.next()).toBe("a");
    expect(await q.next()).toBe("b");
  });

  it("resolves a waiting reader on push", async () => {
    const q = new LineQueue();
    const pending = q.next();
    q.push("x");
    expect(await pending).toBe("x");
    expect(q.pending).toBe(0);
  });

  it("drains buffered lines before surfacing the close error", async () => {
    const q = new LineQueue();
    q.push("last");
    q.close(new Error("closed"));
    expect(q.closed).toBe(true);
    expect(await q.next()).toBe("last");
    await expect(q.next()).rejects.toThrow("closed");
  });

  it("rejects waiting readers on close and ignores later pushes", async () => {
    const q = new LineQueue();
    const pending = q.next();
    q.close(new Error("gone"));
    q.push("late");
    await expect(pending).rejects.toThrow("gone");
    expect(q.pending).toBe(0);
  });
});
