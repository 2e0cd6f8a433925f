/**
 * @file taskStore.ts
 * @description Registry of every task submitted to a pool
 */

import { RequestTask } from "../models/task";
import { Logger } from "../utils/logger";
import { PoolError, PoolErrorCode } from "../errors/poolError";

/**
 * @class TaskStore
 * @description Holds tasks by id for the lifetime of the pool, whatever their state
 */
export class TaskStore {
  private tasks: Map<string, RequestTask> = new Map();

  public get size(): number {
    return this.tasks.size;
  }

  /**
   * @method createTask
   * @description Register a new task
   * @throws {PoolError} DUPLICATE_TASK when the id is already registered
   */
  public createTask(task: RequestTask): RequestTask {
    if (this.tasks.has(task.id)) {
      throw new PoolError(
        PoolErrorCode.DUPLICATE_TASK,
        `Task with ID ${task.id} already exists`
      );
    }

    this.tasks.set(task.id, task);
    Logger.debug(`Registered task ${task.id}`);
    return task;
  }

  public hasTask(taskId: string): boolean {
    return this.tasks.has(taskId);
  }

  /**
   * @method getTask
   * @description Retrieve a task by ID
   */
  public getTask(taskId: string): RequestTask | null {
    return this.tasks.get(taskId) ?? null;
  }

  /**
   * @method listTasks
   * @description Snapshot of all registered tasks
   */
  public listTasks(): RequestTask[] {
    return Array.from(this.tasks.values());
  }
}
