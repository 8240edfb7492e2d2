/**
 * Ordered hand-off between a push-based line source (parser 'data' events)
 * and a pull-based reader awaiting `next()`.
 *
 * Lines buffered before `close()` are still delivered, in arrival order,
 * before the close error surfaces.
 */
export class LineQueue {
  private lines: string[] = [];
  private waiters: Array<{
    resolve: (line: string) => void;
    reject: (error: Error) => void;
  }> = [];
  private closedWith: Error | null = null;

  get closed(): boolean {
    return this.closedWith !== null;
  }

  get pending(): number {
    return this.lines.length;
  }

  push(line: string): void {
    if (this.closedWith) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(line);
    } else {
      this.lines.push(line);
    }
  }

  close(error: Error): void {
    if (this.closedWith) return;
    this.closedWith = error;
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w.reject(error);
  }

  next(): Promise<string> {
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.closedWith) return Promise.reject(this.closedWith);
    return new Promise<string>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }
}
