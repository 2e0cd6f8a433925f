/**
 * @file httpClient.ts
 * @description axios-backed implementation of the pool's Transport contract
 */

import axios, { AxiosInstance, AxiosResponse } from "axios";
import { Logger } from "../utils/logger";
import { delay, errorMessage } from "../utils/utils";
import { TransportError, TransportErrorCode } from "../errors/transportError";
import { HttpMethod, RequestResult } from "../models/task";
import {
  Transport,
  TransportOutcome,
  TransportRequest,
} from "../interfaces/transport";

/**
 * @interface HttpClientConfig
 * @description Configuration options for the HTTP client
 */
export interface HttpClientConfig {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  userAgent?: string;
  referer?: string;
  /**
   * Content type sent with POST bodies
   */
  contentType?: string;
  headers?: Record<string, string>;
}

const DEFAULT_POST_CONTENT_TYPE = "application/x-www-form-urlencoded";

/**
 * @function normalizeHeaders
 * @description Flattens axios response headers into lower-cased string pairs
 */
export function normalizeHeaders(headers: object): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    normalized[name.toLowerCase()] = Array.isArray(value)
      ? value.join(", ")
      : String(value);
  }
  return normalized;
}

/**
 * @class HttpClient
 * @description Sends GET/POST requests with per-attempt timeout and fixed-delay retries
 */
export class HttpClient implements Transport {
  private readonly client: AxiosInstance;

  /**
   * @constructor
   * @param {HttpClientConfig} config - Timeouts, retries and default headers
   * @param {AxiosInstance} [client] - Preconfigured axios instance
   */
  constructor(
    private readonly config: HttpClientConfig,
    client?: AxiosInstance
  ) {
    if (config.timeoutMs <= 0) {
      throw new TransportError(
        TransportErrorCode.UNKNOWN_ERROR,
        0,
        "Timeout must be greater than 0"
      );
    }
    if (config.maxRetries < 0) {
      throw new TransportError(
        TransportErrorCode.UNKNOWN_ERROR,
        0,
        "Max retries must not be negative"
      );
    }
    this.client = client ?? axios.create();
  }

  /**
   * @method execute
   * @description Runs one request, retrying network failures and 5xx responses
   */
  public async execute(request: TransportRequest): Promise<TransportOutcome> {
    const attempts = this.config.maxRetries + 1;
    let outcome: TransportOutcome = {
      ok: false,
      error: new TransportError(TransportErrorCode.UNKNOWN_ERROR, 0),
    };

    for (let attempt = 1; attempt <= attempts; attempt++) {
      outcome = await this.attempt(request);
      if (outcome.ok || !this.isRetryable(outcome.error)) {
        return outcome;
      }
      if (attempt < attempts) {
        Logger.warn(
          `${request.method} ${request.url} failed (attempt ${attempt}/${attempts}): ${outcome.error.message}`
        );
        await delay(this.config.retryDelayMs);
      }
    }

    return outcome;
  }

  private async attempt(request: TransportRequest): Promise<TransportOutcome> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.request<unknown>({
        url: request.url,
        method: request.method,
        data: request.method === HttpMethod.POST ? request.body ?? "" : undefined,
        headers: this.buildHeaders(request.method),
        timeout: this.config.timeoutMs,
        responseType: "text",
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });
    } catch (error) {
      return { ok: false, error: this.toTransportError(error) };
    }

    const result = this.toResult(response);
    if (response.status < 200 || response.status >= 300) {
      const error = new TransportError(
        TransportErrorCode.HTTP_STATUS,
        response.status,
        `${request.method} ${request.url} responded with status ${response.status}`
      );
      return { ok: false, error, result: { ...result, errorMessage: error.message } };
    }

    Logger.debug(`${request.method} ${request.url} -> ${response.status}`);
    return { ok: true, result };
  }

  private buildHeaders(method: HttpMethod): Record<string, string> {
    const headers: Record<string, string> = { ...this.config.headers };
    if (this.config.userAgent) {
      headers["User-Agent"] = this.config.userAgent;
    }
    if (this.config.referer) {
      headers["Referer"] = this.config.referer;
    }
    if (method === HttpMethod.POST) {
      headers["Content-Type"] =
        this.config.contentType ?? DEFAULT_POST_CONTENT_TYPE;
    }
    return headers;
  }

  private toResult(response: AxiosResponse<unknown>): RequestResult {
    const data = response.data;
    let body = "";
    if (typeof data === "string") {
      body = data;
    } else if (data !== undefined && data !== null) {
      body = JSON.stringify(data);
    }
    return {
      body,
      statusCode: response.status,
      headers: normalizeHeaders(response.headers),
      errorMessage: "",
    };
  }

  private toTransportError(error: unknown): TransportError {
    if (axios.isAxiosError(error)) {
      const timedOut =
        error.code === "ECONNABORTED" || error.code === "ETIMEDOUT";
      return new TransportError(
        timedOut ? TransportErrorCode.TIMEOUT : TransportErrorCode.NETWORK_ERROR,
        0,
        error.message
      );
    }
    return new TransportError(
      TransportErrorCode.UNKNOWN_ERROR,
      0,
      errorMessage(error)
    );
  }

  private isRetryable(error: Error): boolean {
    if (!(error instanceof TransportError)) {
      return false;
    }
    if (error.code === TransportErrorCode.HTTP_STATUS) {
      return error.status >= 500;
    }
    return (
      error.code === TransportErrorCode.NETWORK_ERROR ||
      error.code === TransportErrorCode.TIMEOUT
    );
  }
}
