/**
 * @file taskProcessor.ts
 * @description Runs a single task through its transport and records the outcome
 */

import {
  RequestTask,
  RequestResult,
  TaskState,
  emptyResult,
} from "../models/task";
import { Transport, TransportOutcome } from "../interfaces/transport";
import { Logger } from "../utils/logger";
import { errorMessage, toError } from "../utils/utils";

/**
 * @interface ExecutionCounters
 * @description Counters the processor keeps in step with task transitions
 */
export interface ExecutionCounters {
  running: number;
  completed: number;
  failed: number;
}

/**
 * @class TaskProcessor
 * @description Handles the execution of individual tasks
 */
export class TaskProcessor {
  /**
   * @constructor
   * @param {Transport} transport - Used for tasks that carry no transport of their own
   * @param {ExecutionCounters} counters - Shared with the owning pool
   */
  constructor(
    private readonly transport: Transport,
    private readonly counters: ExecutionCounters
  ) {}

  /**
   * @method execute
   * @description Moves the task to RUNNING synchronously, then awaits the
   * transport. Never rejects: every failure ends up in the task.
   */
  public async execute(task: RequestTask): Promise<void> {
    task.state = TaskState.RUNNING;
    task.startedAt = new Date();
    this.counters.running++;

    try {
      const outcome = await this.send(task);
      if (outcome.ok) {
        this.complete(task, outcome.result);
      } else {
        this.fail(task, outcome.error, outcome.result);
      }
    } finally {
      this.counters.running--;
    }
  }

  private async send(task: RequestTask): Promise<TransportOutcome> {
    const transport = task.transport ?? this.transport;
    try {
      return await transport.execute({
        url: task.url,
        method: task.method,
        body: task.body,
      });
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }

  private complete(task: RequestTask, result: RequestResult): void {
    task.result = result;
    task.state = TaskState.COMPLETED;
    task.completedAt = new Date();
    this.counters.completed++;
    Logger.debug(`Task ${task.id} completed with status ${result.statusCode}`);

    if (task.onSuccess) {
      try {
        task.onSuccess(task);
      } catch (error) {
        Logger.error(`Success callback of task ${task.id} threw: ${errorMessage(error)}`);
      }
    }
  }

  private fail(task: RequestTask, error: Error, partial?: RequestResult): void {
    task.result = { ...(partial ?? emptyResult()), errorMessage: error.message };
    task.state = TaskState.FAILED;
    task.completedAt = new Date();
    this.counters.failed++;
    Logger.warn(`Task ${task.id} failed: ${error.message}`);

    if (task.onFailure) {
      try {
        task.onFailure(task, error);
      } catch (callbackError) {
        Logger.error(
          `Failure callback of task ${task.id} threw: ${errorMessage(callbackError)}`
        );
      }
    }
  }
}
