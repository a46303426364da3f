import type { WriteResult } from './document.js';

/**
 * Document writes run one after another in the order they were queued.
 * Results are collected until someone drains them.
 */
class WriteQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending: Promise<WriteResult>[] = [];

  enqueue(task: () => Promise<WriteResult>): void {
    const result = this.tail.then(task);
    this.tail = result;
    this.pending.push(result);
  }

  get size(): number {
    return this.pending.length;
  }

  /** Waits for every queued write, including ones queued while waiting. */
  async drain(): Promise<WriteResult[]> {
    const results: WriteResult[] = [];
    while (this.pending.length > 0) {
      const batch = this.pending;
      this.pending = [];
      results.push(...(await Promise.all(batch)));
    }
    return results;
  }
}

export { WriteQueue };
