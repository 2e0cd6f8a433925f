/**
 * @enum {string}
 * @description Enumeration of possible error codes for HTTP transport operations
 */
export enum TransportErrorCode {
  NETWORK_ERROR = "NETWORK_ERROR",
  TIMEOUT = "TIMEOUT",
  HTTP_STATUS = "HTTP_STATUS",
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
}

/**
 * @class TransportError
 * @description Custom error class for failed outbound requests
 * @extends Error
 */
export class TransportError extends Error {
  /**
   * @constructor
   * @param {TransportErrorCode} code - The error code
   * @param {number} status - HTTP status code if applicable, 0 otherwise
   * @param {string} [details] - Additional error details
   */
  constructor(
    public readonly code: TransportErrorCode,
    public readonly status: number,
    public readonly details?: string
  ) {
    super(`${code}: ${details || "An error occurred"}`);
    this.name = "TransportError";
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}
