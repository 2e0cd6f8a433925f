/**
 * @file requestPool.ts
 * @description Bounded-concurrency pool for outbound requests: admission,
 * dispatch, status reporting and shutdown
 */

import {
  FailureCallback,
  HttpMethod,
  PoolStatus,
  RequestTask,
  SuccessCallback,
  TaskState,
  createRequestTask,
} from "../models/task";
import { Transport } from "../interfaces/transport";
import { PoolError, PoolErrorCode } from "../errors/poolError";
import { Logger } from "../utils/logger";
import { delay, errorMessage } from "../utils/utils";
import { ConcurrencyGate } from "./concurrencyGate";
import { TaskQueue } from "./taskQueue";
import { TaskStore } from "./taskStore";
import { ExecutionCounters, TaskProcessor } from "./taskProcessor";

/**
 * @interface PoolConfig
 * @description Configuration options for the request pool
 */
export interface PoolConfig {
  maxConcurrency: number;
  /**
   * Re-check interval (ms) while the queue is empty but requests are in flight
   */
  pollIntervalMs?: number;
}

/**
 * @enum DispatchState
 * @description Lifecycle of the dispatch loop
 */
export enum DispatchState {
  IDLE = "IDLE",
  DRAINING = "DRAINING",
  STOPPED = "STOPPED",
}

export type CompletionListener = (status: PoolStatus) => void;

interface PoolCounters extends ExecutionCounters {
  total: number;
  cancelled: number;
}

const DEFAULT_POLL_INTERVAL_MS = 100;

/**
 * @class RequestPool
 * @description Runs submitted requests with at most `maxConcurrency` in flight.
 * Tasks start in submission order; the dispatch loop starts on the first
 * submission and goes idle again once everything has settled.
 */
export class RequestPool {
  private readonly store = new TaskStore();
  private readonly queue = new TaskQueue();
  private readonly gate: ConcurrencyGate;
  private readonly processor: TaskProcessor;
  private readonly abortController = new AbortController();
  private readonly completionListeners: Set<CompletionListener> = new Set();
  private readonly counters: PoolCounters = {
    total: 0,
    running: 0,
    completed: 0,
    failed: 0,
    cancelled: 0,
  };
  private readonly pollIntervalMs: number;

  private dispatchState: DispatchState = DispatchState.IDLE;
  private dispatchLoop: Promise<void> | null = null;
  private accepting = true;
  private disposed = false;

  /**
   * @constructor
   * @param {Transport} transport - Default transport for submitted tasks
   * @param {PoolConfig} config - Pool configuration
   * @throws {PoolError} INVALID_CONFIG for a non-positive or fractional limit
   */
  constructor(transport: Transport, private readonly config: PoolConfig) {
    if (!Number.isInteger(config.maxConcurrency) || config.maxConcurrency <= 0) {
      throw new PoolError(
        PoolErrorCode.INVALID_CONFIG,
        `maxConcurrency must be a positive integer (got ${config.maxConcurrency})`
      );
    }
    const pollIntervalMs = config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    if (!(pollIntervalMs > 0)) {
      throw new PoolError(
        PoolErrorCode.INVALID_CONFIG,
        `pollIntervalMs must be greater than 0 (got ${pollIntervalMs})`
      );
    }

    this.pollIntervalMs = pollIntervalMs;
    this.gate = new ConcurrencyGate(config.maxConcurrency);
    this.processor = new TaskProcessor(transport, this.counters);
  }

  public get maxConcurrency(): number {
    return this.config.maxConcurrency;
  }

  public get state(): DispatchState {
    return this.dispatchState;
  }

  public get isRunning(): boolean {
    return this.dispatchState === DispatchState.DRAINING;
  }

  /**
   * @method submit
   * @description Register and enqueue a task, starting the dispatch loop if idle
   * @throws {PoolError} when the task is invalid or the pool no longer accepts work
   */
  public submit(task: RequestTask): void {
    this.assertAccepting();
    this.validateTask(task);

    this.store.createTask(task);
    this.queue.enqueue(task);
    this.counters.total++;
    Logger.debug(`Submitted ${task.method} ${task.url} as task ${task.id}`);

    this.ensureDispatching();
  }

  /**
   * @method submitMany
   * @description Submit tasks in order. Stops at the first rejected task and
   * rethrows its error; tasks accepted before it stay in the pool.
   */
  public submitMany(tasks: Iterable<RequestTask>): void {
    for (const task of tasks) {
      this.submit(task);
    }
  }

  /**
   * @method submitGet
   * @description Create and submit a GET task
   * @returns {string} The new task's id
   */
  public submitGet(
    url: string,
    onSuccess?: SuccessCallback,
    onFailure?: FailureCallback
  ): string {
    const task = createRequestTask({
      url,
      method: HttpMethod.GET,
      onSuccess,
      onFailure,
    });
    this.submit(task);
    return task.id;
  }

  /**
   * @method submitPost
   * @description Create and submit a POST task
   * @returns {string} The new task's id
   */
  public submitPost(
    url: string,
    body: string,
    onSuccess?: SuccessCallback,
    onFailure?: FailureCallback
  ): string {
    const task = createRequestTask({
      url,
      method: HttpMethod.POST,
      body,
      onSuccess,
      onFailure,
    });
    this.submit(task);
    return task.id;
  }

  /**
   * @method getStatus
   * @description Counters at this moment. Approximate while dispatching,
   * exact once idle.
   */
  public getStatus(): PoolStatus {
    return {
      total: this.counters.total,
      pending: this.queue.length,
      running: this.counters.running,
      completed: this.counters.completed,
      failed: this.counters.failed,
      cancelled: this.counters.cancelled,
      isRunning: this.isRunning,
    };
  }

  public getTask(taskId: string): Readonly<RequestTask> | null {
    return this.store.getTask(taskId);
  }

  public listTasks(): Readonly<RequestTask>[] {
    return this.store.listTasks();
  }

  /**
   * @method addCompletionListener
   * @description Called with a status snapshot each time the pool goes idle
   */
  public addCompletionListener(listener: CompletionListener): void {
    this.completionListeners.add(listener);
  }

  public removeCompletionListener(listener: CompletionListener): void {
    this.completionListeners.delete(listener);
  }

  /**
   * @method waitForAll
   * @description Resolves true once nothing is queued or running, or false
   * if `timeoutMs` elapses first. Waiting has no effect on the tasks.
   */
  public async waitForAll(timeoutMs?: number): Promise<boolean> {
    const deadline = timeoutMs === undefined ? Infinity : Date.now() + timeoutMs;

    while (!this.isSettled()) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return false;
      }
      await delay(Math.min(this.pollIntervalMs, remaining));
    }
    return true;
  }

  /**
   * @method stop
   * @description Graceful stop: refuse new submissions, let queued and running
   * tasks finish, then end the dispatch loop. Tasks still queued when the
   * timeout expires are cancelled.
   * @returns {Promise<boolean>} whether everything finished before the timeout
   */
  public async stop(timeoutMs?: number): Promise<boolean> {
    if (this.dispatchState === DispatchState.STOPPED) {
      return this.waitForAll(timeoutMs);
    }

    Logger.info("Stopping request pool");
    this.accepting = false;
    const drained = await this.waitForAll(timeoutMs);

    this.dispatchState = DispatchState.STOPPED;
    this.abortController.abort();
    this.cancelQueued();

    if (this.dispatchLoop) {
      await this.dispatchLoop;
    }
    Logger.info(`Request pool stopped (${drained ? "drained" : "timed out"})`);
    return drained;
  }

  /**
   * @method stopNow
   * @description Immediate stop: cancel every queued task. Requests already in
   * flight are not interrupted and finish normally.
   */
  public stopNow(): void {
    this.accepting = false;
    this.dispatchState = DispatchState.STOPPED;
    this.abortController.abort();
    const cancelled = this.cancelQueued();
    if (cancelled > 0) {
      Logger.info(`Request pool stopped, ${cancelled} queued task(s) cancelled`);
    }
  }

  /**
   * @method dispose
   * @description Immediate stop plus teardown of the gate. Safe to call twice.
   */
  public dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.stopNow();
    this.gate.dispose();
  }

  private assertAccepting(): void {
    if (this.disposed) {
      throw new PoolError(PoolErrorCode.POOL_DISPOSED, "Request pool has been disposed");
    }
    if (this.dispatchState === DispatchState.STOPPED) {
      throw new PoolError(PoolErrorCode.POOL_STOPPED, "Request pool has been stopped");
    }
    if (!this.accepting) {
      throw new PoolError(PoolErrorCode.POOL_STOPPING, "Request pool is stopping");
    }
  }

  private validateTask(task: RequestTask | null | undefined): void {
    if (!task) {
      throw new PoolError(PoolErrorCode.INVALID_TASK, "Task is required");
    }
    if (typeof task.url !== "string" || task.url.trim() === "") {
      throw new PoolError(PoolErrorCode.INVALID_TASK, "Task URL must not be empty");
    }
    if (task.method !== HttpMethod.GET && task.method !== HttpMethod.POST) {
      throw new PoolError(
        PoolErrorCode.INVALID_TASK,
        `Unsupported method ${String(task.method)}`
      );
    }
    if (task.state !== TaskState.PENDING) {
      throw new PoolError(
        PoolErrorCode.INVALID_TASK,
        `Task ${task.id} is ${task.state}, only PENDING tasks can be submitted`
      );
    }
  }

  private isSettled(): boolean {
    return (
      this.dispatchState !== DispatchState.DRAINING &&
      this.queue.isEmpty() &&
      this.counters.running === 0
    );
  }

  /**
   * Check-then-start runs without an await in between, so two submissions
   * can never both see IDLE.
   */
  private ensureDispatching(): void {
    if (this.dispatchState !== DispatchState.IDLE) {
      return;
    }
    this.dispatchState = DispatchState.DRAINING;
    Logger.info("Dispatch loop started");
    this.dispatchLoop = this.runDispatchLoop(this.abortController.signal).catch(
      (error) => {
        Logger.error(`Dispatch loop failed: ${errorMessage(error)}`);
      }
    );
  }

  private async runDispatchLoop(signal: AbortSignal): Promise<void> {
    const inFlight = new Set<Promise<void>>();

    while (!signal.aborted) {
      if (this.queue.isEmpty()) {
        if (this.counters.running === 0) {
          this.dispatchState = DispatchState.IDLE;
          Logger.info("All tasks completed, dispatch loop idle");
          this.notifyCompletion(this.getStatus());
          break;
        }
        await delay(this.pollIntervalMs, signal);
        continue;
      }

      const acquired = await this.gate.acquire(signal);
      if (!acquired) {
        break;
      }
      if (signal.aborted) {
        this.gate.release();
        break;
      }

      const task = this.queue.dequeue();
      if (!task) {
        this.gate.release();
        continue;
      }

      const execution = this.launch(task).then(() => {
        inFlight.delete(execution);
      });
      inFlight.add(execution);
    }

    await Promise.all(inFlight);
  }

  /**
   * The gate slot taken by the loop is released here on every exit path.
   */
  private async launch(task: RequestTask): Promise<void> {
    try {
      await this.processor.execute(task);
    } catch (error) {
      Logger.error(`Unexpected error executing task ${task.id}: ${errorMessage(error)}`);
    } finally {
      this.gate.release();
    }
  }

  private cancelQueued(): number {
    const queued = this.queue.drain();
    const now = new Date();
    for (const task of queued) {
      task.state = TaskState.CANCELLED;
      task.completedAt = now;
      this.counters.cancelled++;
    }
    return queued.length;
  }

  private notifyCompletion(status: PoolStatus): void {
    for (const listener of Array.from(this.completionListeners)) {
      try {
        listener(status);
      } catch (error) {
        Logger.error(`Completion listener threw: ${errorMessage(error)}`);
      }
    }
  }
}
