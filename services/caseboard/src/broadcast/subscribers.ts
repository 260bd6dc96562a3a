/**
 * Subscriber Set
 * Best-effort fan-out to live viewers of one message type
 */

import { BroadcastError, type ChildLogger } from "@tipboard/core";

/**
 * Live viewer. A subscriber whose delivery throws or rejects is dropped.
 */
export interface Subscriber<M> {
  id: string;
  deliver(message: M): void | Promise<void>;
}

export class SubscriberSet<M> {
  private readonly subscribers = new Map<string, Subscriber<M>>();

  constructor(private readonly log: ChildLogger) {}

  add(subscriber: Subscriber<M>): () => void {
    this.subscribers.set(subscriber.id, subscriber);
    return () => {
      this.subscribers.delete(subscriber.id);
    };
  }

  get size(): number {
    return this.subscribers.size;
  }

  /**
   * Deliver to every subscriber concurrently. Never throws.
   */
  async deliverAll(message: M): Promise<void> {
    await Promise.all(
      [...this.subscribers.values()].map((subscriber) => this.deliver(subscriber, message))
    );
  }

  private async deliver(subscriber: Subscriber<M>, message: M): Promise<void> {
    try {
      await subscriber.deliver(message);
    } catch (error) {
      this.subscribers.delete(subscriber.id);
      const failure = new BroadcastError(
        subscriber.id,
        error instanceof Error ? error : undefined
      );
      this.log.warn(`${failure.message}, subscriber dropped`, {
        subscriberId: subscriber.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
