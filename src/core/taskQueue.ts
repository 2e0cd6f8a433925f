/**
 * @file taskQueue.ts
 * @description FIFO admission queue of tasks that have not started yet
 */

import { RequestTask } from "../models/task";

/**
 * @class TaskQueue
 * @description Ordered holding area for pending tasks. Backed by an array with
 * a moving head so dequeue stays O(1) amortised.
 */
export class TaskQueue {
  private items: RequestTask[] = [];
  private head = 0;

  public get length(): number {
    return this.items.length - this.head;
  }

  public isEmpty(): boolean {
    return this.length === 0;
  }

  /**
   * @method enqueue
   * @description Append a task at the tail
   */
  public enqueue(task: RequestTask): void {
    this.items.push(task);
  }

  /**
   * @method dequeue
   * @description Remove and return the oldest task, or undefined when empty
   */
  public dequeue(): RequestTask | undefined {
    if (this.isEmpty()) {
      return undefined;
    }
    const task = this.items[this.head];
    this.head++;
    if (this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return task;
  }

  /**
   * @method drain
   * @description Empty the queue, returning its tasks oldest first
   */
  public drain(): RequestTask[] {
    const drained = this.items.slice(this.head);
    this.items = [];
    this.head = 0;
    return drained;
  }
}
