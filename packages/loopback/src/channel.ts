// Simple async channel for in-memory delivery.

/**
 * An unbounded multi-producer single-consumer async channel.
 *
 * A channel ends either cleanly (`close()`: buffered values are still
 * delivered, then null) or with an error (`fail()`: buffered values are
 * dropped and every receive rejects).
 */
export interface Channel<T> {
  send(value: T): boolean;
  recv(): Promise<T | null>;
  close(): void;
  fail(error: Error): void;
  isClosed(): boolean;
}

interface Waiter<T> {
  resolve: (value: T | null) => void;
  reject: (error: Error) => void;
}

interface ChannelState<T> {
  buffer: T[];
  closed: boolean;
  error: Error | null;
  waiters: Array<Waiter<T>>;
}

/**
 * Create a new channel.
 */
export function createChannel<T>(): Channel<T> {
  const state: ChannelState<T> = {
    buffer: [],
    closed: false,
    error: null,
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
        waiter.resolve(value);
        return true;
      }

      state.buffer.push(value);
      return true;
    },

    async recv(): Promise<T | null> {
      if (state.error) {
        throw state.error;
      }

      if (state.buffer.length > 0) {
        const [value] = state.buffer.splice(0, 1);
        return value ?? null;
      }

      if (state.closed) {
        return null;
      }

      return new Promise((resolve, reject) => {
        state.waiters.push({ resolve, reject });
      });
    },

    close(): void {
      if (state.closed) return;
      state.closed = true;
      // Only waiters left means the buffer is empty
      for (const waiter of state.waiters) {
        waiter.resolve(null);
      }
      state.waiters.length = 0;
    },

    fail(error: Error): void {
      if (state.error) return;
      state.closed = true;
      state.error = error;
      state.buffer.length = 0;
      for (const waiter of state.waiters) {
        waiter.reject(error);
      }
      state.waiters.length = 0;
    },

    isClosed(): boolean {
      return state.closed;
    },
  };
}
