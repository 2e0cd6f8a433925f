/**
 * @file task.ts
 * @description Type definitions for request tasks and pool status
 */

import { v4 as uuidv4 } from "uuid";
import { Transport } from "../interfaces/transport";

/**
 * @enum TaskState
 * @description Possible states of a task. COMPLETED, FAILED and CANCELLED are terminal.
 */
export enum TaskState {
  PENDING = "PENDING",
  RUNNING = "RUNNING",
  COMPLETED = "COMPLETED",
  FAILED = "FAILED",
  CANCELLED = "CANCELLED",
}

export const TERMINAL_STATES: readonly TaskState[] = [
  TaskState.COMPLETED,
  TaskState.FAILED,
  TaskState.CANCELLED,
];

export function isTerminalState(state: TaskState): boolean {
  return TERMINAL_STATES.includes(state);
}

/**
 * @enum HttpMethod
 * @description Request methods the pool accepts
 */
export enum HttpMethod {
  GET = "GET",
  POST = "POST",
}

/**
 * @interface RequestResult
 * @description Outcome payload of one request
 */
export interface RequestResult {
  /**
   * @property {string} body - Raw response body as text
   */
  body: string;

  /**
   * @property {number} statusCode - HTTP status code, 0 when no response arrived
   */
  statusCode: number;

  /**
   * @property {Record<string, string>} headers - Response headers, lower-cased names
   */
  headers: Record<string, string>;

  /**
   * @property {string} errorMessage - Failure description, empty on success
   */
  errorMessage: string;
}

export type SuccessCallback = (task: Readonly<RequestTask>) => void;
export type FailureCallback = (task: Readonly<RequestTask>, error: Error) => void;

/**
 * @interface RequestTask
 * @description One unit of submitted work. Only the pool mutates the
 * lifecycle fields; callers get read-only views back.
 */
export interface RequestTask {
  readonly id: string;
  readonly url: string;
  readonly method: HttpMethod;
  readonly body?: string;
  readonly name?: string;

  /**
   * @property {Transport} [transport] - Overrides the pool's transport for this task
   */
  readonly transport?: Transport;

  readonly createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;

  state: TaskState;
  result?: RequestResult;

  readonly onSuccess?: SuccessCallback;
  readonly onFailure?: FailureCallback;
}

/**
 * @interface RequestTaskInit
 * @description Caller-provided fields for a new task
 */
export interface RequestTaskInit {
  url: string;
  method?: HttpMethod;
  body?: string;
  name?: string;
  transport?: Transport;
  onSuccess?: SuccessCallback;
  onFailure?: FailureCallback;
}

/**
 * @function createRequestTask
 * @description Builds a pending task with a fresh identifier
 */
export function createRequestTask(init: RequestTaskInit): RequestTask {
  return {
    id: uuidv4(),
    url: init.url,
    method: init.method ?? HttpMethod.GET,
    body: init.body,
    name: init.name,
    transport: init.transport,
    createdAt: new Date(),
    state: TaskState.PENDING,
    onSuccess: init.onSuccess,
    onFailure: init.onFailure,
  };
}

/**
 * @function emptyResult
 * @description Result placeholder for failures that produced no response
 */
export function emptyResult(): RequestResult {
  return { body: "", statusCode: 0, headers: {}, errorMessage: "" };
}

/**
 * @function parseJsonBody
 * @description Parses a result body as JSON, returning null when it is blank or malformed
 */
export function parseJsonBody(result: RequestResult): unknown {
  if (!result.body.trim()) {
    return null;
  }
  try {
    return JSON.parse(result.body);
  } catch {
    return null;
  }
}

/**
 * @interface PoolStatus
 * @description Point-in-time counters of a request pool
 */
export interface PoolStatus {
  total: number;
  pending: number;
  running: number;
  completed: number;
  failed: number;
  cancelled: number;
  isRunning: boolean;
}
