import type { EventSource } from '../editor/input.js';

interface ChannelState<T> {
  queue: T[];
  waiters: ((value: T | undefined) => void)[];
  closed: boolean;
}

class Sender<T> {
  constructor(private readonly state: ChannelState<T>) {}

  send(value: T): void {
    if (this.state.closed) {
      throw new Error('Cannot send on a closed channel');
    }
    const waiter = this.state.waiters.shift();
    if (waiter) {
      waiter(value);
      return;
    }
    this.state.queue.push(value);
  }

  /** Wakes any waiting receiver with `undefined`; queued values stay readable. */
  close(): void {
    this.state.closed = true;
    for (const waiter of this.state.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  get isClosed(): boolean {
    return this.state.closed;
  }
}

class Receiver<T> implements EventSource<T> {
  constructor(private readonly state: ChannelState<T>) {}

  tryRecv(): T | undefined {
    return this.state.queue.shift();
  }

  recv(): Promise<T | undefined> {
    const value = this.state.queue.shift();
    if (value !== undefined || this.state.closed) {
      return Promise.resolve(value);
    }
    return new Promise((resolve) => {
      this.state.waiters.push(resolve);
    });
  }

  get size(): number {
    return this.state.queue.length;
  }
}

/** An unbounded FIFO queue split into its producer and consumer halves. */
function unboundedChannel<T>(): [Sender<T>, Receiver<T>] {
  const state: ChannelState<T> = { queue: [], waiters: [], closed: false };
  return [new Sender(state), new Receiver(state)];
}

export { Receiver, Sender, unboundedChannel };
