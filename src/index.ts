/**
 * @file index.ts
 * @description Public entry point of the request pool package
 */

export {
  RequestPool,
  PoolConfig,
  DispatchState,
  CompletionListener,
} from "./core/requestPool";
export { ConcurrencyGate } from "./core/concurrencyGate";
export { TaskQueue } from "./core/taskQueue";
export { TaskStore } from "./core/taskStore";
export { TaskProcessor, ExecutionCounters } from "./core/taskProcessor";
export { HttpClient, HttpClientConfig } from "./clients/httpClient";
export {
  Transport,
  TransportOutcome,
  TransportRequest,
} from "./interfaces/transport";
export {
  TaskState,
  HttpMethod,
  RequestTask,
  RequestTaskInit,
  RequestResult,
  PoolStatus,
  SuccessCallback,
  FailureCallback,
  createRequestTask,
  parseJsonBody,
  isTerminalState,
} from "./models/task";
export { PoolError, PoolErrorCode } from "./errors/poolError";
export { TransportError, TransportErrorCode } from "./errors/transportError";
export { Logger, LogLevel } from "./utils/logger";
export { validateEnv, getEnvConfig } from "./utils/checkEnv";
export { PoolEnvConfig, defaultConfig } from "./config/env";
