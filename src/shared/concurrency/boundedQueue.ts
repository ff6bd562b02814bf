/**
 * Bounded FIFO channel between pipeline stages (no external deps).
 *
 * - `push` suspends while the queue is full.
 * - `pop` suspends while the queue is empty and resolves `undefined` once the
 *   queue is closed and drained.
 * - `abort` drops buffered items and rejects every pending and future call
 *   with the given reason.
 */
export type BoundedQueue<T extends object> = {
  push(item: T): Promise<void>;
  pop(): Promise<T | undefined>;
  close(): void;
  abort(reason: unknown): void;
  size(): number;
  isClosed(): boolean;
};

export class QueueClosedError extends Error {
  constructor() {
    super("push on a closed queue");
    this.name = "QueueClosedError";
  }
}

type Taker<T> = { resolve: (item: T | undefined) => void; reject: (reason: unknown) => void };
type Putter<T> = { item: T; resolve: () => void; reject: (reason: unknown) => void };

export const createBoundedQueue = <T extends object>(capacity: number): BoundedQueue<T> => {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new Error("capacity must be an integer >= 1");
  }

  const items: T[] = [];
  const takers: Array<Taker<T>> = [];
  const putters: Array<Putter<T>> = [];
  let closed = false;
  let failure: { reason: unknown } | undefined;

  // A waiting putter only exists while the buffer is full, so one slot freed
  // admits exactly one of them.
  const admitPutter = () => {
    const putter = putters.shift();
    if (!putter) return;
    items.push(putter.item);
    putter.resolve();
  };

  return {
    push: async (item) => {
      if (failure) throw failure.reason;
      if (closed) throw new QueueClosedError();

      const taker = takers.shift();
      if (taker) {
        taker.resolve(item);
        return;
      }

      if (items.length < capacity) {
        items.push(item);
        return;
      }

      return new Promise<void>((resolve, reject) => {
        putters.push({ item, resolve, reject });
      });
    },

    pop: async () => {
      if (failure) throw failure.reason;

      const head = items.shift();
      if (head !== undefined) {
        admitPutter();
        return head;
      }

      if (closed) return undefined;

      return new Promise<T | undefined>((resolve, reject) => {
        takers.push({ resolve, reject });
      });
    },

    close: () => {
      if (closed) return;
      closed = true;
      // Takers only wait on an empty buffer.
      for (const taker of takers.splice(0)) taker.resolve(undefined);
    },

    abort: (reason) => {
      if (failure) return;
      failure = { reason };
      closed = true;
      items.length = 0;
      for (const taker of takers.splice(0)) taker.reject(reason);
      for (const putter of putters.splice(0)) putter.reject(reason);
    },

    size: () => items.length,
    isClosed: () => closed
  };
};
