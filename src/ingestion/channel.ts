import { debugLogger } from '../utils/debug-logger';

export class ChannelClosedError extends Error {
  constructor() {
    super('Channel is closed');
    this.name = 'ChannelClosedError';
  }
}

/**
 * Bounded async queue between the news connector (producer) and the document store (consumer).
 *
 * `push` resolves once the item is buffered, waiting while the buffer is full. The consumer
 * iterates with `for await`; iteration ends after `close()` once the buffer is drained.
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private closed = false;
  private waitingConsumers: Array<(result: IteratorResult<T>) => void> = [];
  private waitingProducers: Array<{ item: T; resolve: () => void; reject: (error: Error) => void }> = [];

  constructor(private readonly capacity = 100) {
    if (capacity < 1) {
      throw new Error(`Channel capacity must be at least 1, got ${capacity}`);
    }
  }

  push = (item: T): Promise<void> => {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    const consumer = this.waitingConsumers.shift();
    if (consumer) {
      consumer({ value: item, done: false });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return Promise.resolve();
    }

    debugLogger.info('INGESTION', 'Channel full, producer waiting', {
      capacity: this.capacity,
      waitingProducers: this.waitingProducers.length + 1
    });

    return new Promise<void>((resolve, reject) => {
      this.waitingProducers.push({ item, resolve, reject });
    });
  };

  /**
   * Stop accepting items. Buffered items are still delivered; blocked producers are rejected.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const producer of this.waitingProducers) {
      producer.reject(new ChannelClosedError());
    }
    this.waitingProducers = [];

    if (this.buffer.length === 0) {
      for (const consumer of this.waitingConsumers) {
        consumer({ value: undefined, done: true });
      }
      this.waitingConsumers = [];
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      this.admitWaitingProducer();
      return Promise.resolve({ value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise(resolve => {
      this.waitingConsumers.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
    };
  }

  private admitWaitingProducer(): void {
    const producer = this.waitingProducers.shift();
    if (producer) {
      this.buffer.push(producer.item);
      producer.resolve();
    }
  }
}
