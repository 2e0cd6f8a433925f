/**
 * @enum {string}
 * @description Enumeration of error codes raised synchronously by the request pool
 */
export enum PoolErrorCode {
  INVALID_CONFIG = "INVALID_CONFIG",
  INVALID_TASK = "INVALID_TASK",
  DUPLICATE_TASK = "DUPLICATE_TASK",
  POOL_STOPPING = "POOL_STOPPING",
  POOL_STOPPED = "POOL_STOPPED",
  POOL_DISPOSED = "POOL_DISPOSED",
  GATE_IMBALANCE = "GATE_IMBALANCE",
}

/**
 * @class PoolError
 * @description Custom error class for pool configuration and submission failures
 * @extends Error
 */
export class PoolError extends Error {
  /**
   * @constructor
   * @param {PoolErrorCode} code - The error code
   * @param {string} [details] - Additional error details
   */
  constructor(
    public readonly code: PoolErrorCode,
    public readonly details?: string
  ) {
    super(`${code}: ${details || "An error occurred"}`);
    this.name = "PoolError";
    Object.setPrototypeOf(this, PoolError.prototype);
  }
}
