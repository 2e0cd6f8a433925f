/**
 * @file transport.ts
 * @description Contract between the request pool and whatever performs the HTTP call
 */

import { HttpMethod, RequestResult } from "../models/task";

export interface TransportRequest {
  url: string;
  method: HttpMethod;
  body?: string;
}

/**
 * @type TransportOutcome
 * @description Result-or-error returned by a transport. A failed outcome may
 * still carry the response it received (e.g. a non-2xx status).
 */
export type TransportOutcome =
  | { ok: true; result: RequestResult }
  | { ok: false; error: Error; result?: RequestResult };

/**
 * @interface Transport
 * @description Executes one request. Implementations should report failures
 * through the outcome; a rejected promise is still treated as a failure.
 */
export interface Transport {
  execute(request: TransportRequest): Promise<TransportOutcome>;
}
