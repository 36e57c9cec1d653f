import { errorFields, logger } from "../logger.js";

/**
 * Bounded FIFO drained by a single worker. Items are handled strictly one
 * at a time in arrival order.
 */
export class MessageQueue<T> {
  private readonly items: T[] = [];
  private draining: Promise<void> | null = null;

  constructor(
    private readonly handler: (item: T) => Promise<void>,
    private readonly capacity: number
  ) {}

  get size(): number {
    return this.items.length;
  }

  /** Returns false when the queue is full and the item was not accepted. */
  push(item: T): boolean {
    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    this.schedule();
    return true;
  }

  /** Resolves once every queued item has been handled. */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private schedule(): void {
    if (this.draining) return;
    this.draining = Promise.resolve()
      .then(() => this.drain())
      .finally(() => {
        this.draining = null;
        if (this.items.length > 0) this.schedule();
      });
  }

  private async drain(): Promise<void> {
    let item = this.items.shift();
    while (item !== undefined) {
      try {
        await this.handler(item);
      } catch (err) {
        logger.error("queue handler failed", errorFields(err));
      }
      item = this.items.shift();
    }
  }
}
