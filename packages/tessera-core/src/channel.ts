// Simple async channel for decoded results.

/**
 * A multi-producer single-consumer async channel.
 *
 * Values are buffered without bound: the receive stack cannot push back on
 * the peer, so nothing it decodes may be dropped here. Size limits belong
 * to the constraints that bound each object.
 */
export interface Channel<T> {
  send(value: T): boolean;
  recv(): Promise<T | null>;
  close(): void;
  isClosed(): boolean;
  /** Number of buffered values not yet received. */
  readonly pending: number;
}

interface ChannelState<T> {
  buffer: T[];
  closed: boolean;
  waiters: Array<(value: T | null) => void>;
}

export function createChannel<T>(): Channel<T> {
  const state: ChannelState<T> = {
    buffer: [],
    closed: false,
    waiters: [],
  };

  return {
    send(value: T): boolean {
      if (state.closed) {
        return false;
      }

      // If there's a waiter, deliver directly
      const waiter = state.waiters.shift();
      if (waiter) {
        waiter(value);
        return true;
      }

      state.buffer.push(value);
      return true;
    },

    async recv(): Promise<T | null> {
      if (state.buffer.length > 0) {
        const [value] = state.buffer.splice(0, 1);
        return value;
      }

      // Channel closed and empty
      if (state.closed) {
        return null;
      }

      return new Promise((resolve) => {
        state.waiters.push(resolve);
      });
    },

    close(): void {
      if (state.closed) return;
      state.closed = true;
      // Wake all waiters with null
      for (const waiter of state.waiters) {
        waiter(null);
      }
      state.waiters.length = 0;
    },

    isClosed(): boolean {
      return state.closed;
    },

    get pending(): number {
      return state.buffer.length;
    },
  };
}

/**
 * Async iteration over a channel until it is closed and drained.
 */
export async function* drain<T>(channel: Channel<T>): AsyncGenerator<T> {
  while (true) {
    const value = await channel.recv();
    if (value === null) return;
    yield value;
  }
}
