/**
 * @file taskQueue.test.ts
 * @description Tests for the FIFO admission queue
 */

import { describe, expect, it, beforeEach } from "@jest/globals";
import { TaskQueue } from "../../../src/core/taskQueue";
import { RequestTask, createRequestTask } from "../../../src/models/task";

describe("TaskQueue", () => {
  let queue: TaskQueue;
  let tasks: RequestTask[];

  beforeEach(() => {
    queue = new TaskQueue();
    tasks = Array.from({ length: 5 }, (_, i) =>
      createRequestTask({ url: `http://example.test/${i + 1}` })
    );
  });

  describe("enqueue/dequeue", () => {
    it("should return tasks in insertion order", () => {
      tasks.forEach((task) => queue.enqueue(task));

      const order: RequestTask[] = [];
      let next = queue.dequeue();
      while (next) {
        order.push(next);
        next = queue.dequeue();
      }

      expect(order).toEqual(tasks);
    });

    it("should return undefined when empty", () => {
      expect(queue.dequeue()).toBeUndefined();
      expect(queue.isEmpty()).toBe(true);
    });

    it("should keep order when enqueueing between dequeues", () => {
      queue.enqueue(tasks[0]);
      queue.enqueue(tasks[1]);
      expect(queue.dequeue()).toBe(tasks[0]);

      queue.enqueue(tasks[2]);
      expect(queue.dequeue()).toBe(tasks[1]);
      expect(queue.dequeue()).toBe(tasks[2]);
      expect(queue.length).toBe(0);
    });
  });

  describe("length", () => {
    it("should track queued tasks", () => {
      tasks.forEach((task) => queue.enqueue(task));
      expect(queue.length).toBe(5);

      queue.dequeue();
      queue.dequeue();
      expect(queue.length).toBe(3);
      expect(queue.isEmpty()).toBe(false);
    });
  });

  describe("drain", () => {
    it("should remove every remaining task oldest first", () => {
      tasks.forEach((task) => queue.enqueue(task));
      queue.dequeue();

      expect(queue.drain()).toEqual(tasks.slice(1));
      expect(queue.length).toBe(0);
      expect(queue.dequeue()).toBeUndefined();
    });
  });
});
