/**
 * Task Queue
 * Binary min-heap ordered by (priority, sequence) with a single async consumer
 */

import type { QueuedTask } from "./types.js";

function before(a: QueuedTask, b: QueuedTask): boolean {
  if (a.priority !== b.priority) return a.priority < b.priority;
  return a.sequence < b.sequence;
}

export class TaskQueue {
  private readonly heap: QueuedTask[] = [];
  private waiter?: (ready: boolean) => void;

  get size(): number {
    return this.heap.length;
  }

  push(task: QueuedTask): void {
    this.heap.push(task);
    this.siftUp(this.heap.length - 1);
    // The parked consumer pops once it resumes, after every push made in this tick
    this.waiter?.(true);
  }

  pop(): QueuedTask | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) return undefined;

    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  /**
   * Next task, or undefined after timeoutMs or on wake()
   */
  async take(timeoutMs: number): Promise<QueuedTask | undefined> {
    const next = this.pop();
    if (next) return next;

    const ready = await new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = undefined;
        resolve(false);
      }, timeoutMs);

      this.waiter = (signal) => {
        clearTimeout(timer);
        this.waiter = undefined;
        resolve(signal);
      };
    });

    return ready ? this.pop() : undefined;
  }

  /**
   * Release a parked consumer empty-handed
   */
  wake(): void {
    this.waiter?.(false);
  }

  clear(): void {
    this.heap.length = 0;
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this.lessAt(child, parent)) break;
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;

      if (left < this.heap.length && this.lessAt(left, smallest)) smallest = left;
      if (right < this.heap.length && this.lessAt(right, smallest)) smallest = right;
      if (smallest === parent) return;

      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private lessAt(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    return a !== undefined && b !== undefined && before(a, b);
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    if (a === undefined || b === undefined) return;
    this.heap[i] = b;
    this.heap[j] = a;
  }
}
