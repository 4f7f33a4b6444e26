/**
 * WAPI errors - management API transport and response failures
 *
 * Abstract base: WapiError
 * Concrete:
 *   - WapiRequestError         (WAPI_REQUEST_FAILED)
 *   - WapiNetworkError         (WAPI_NETWORK_ERROR)
 *   - WapiTimeoutError         (WAPI_TIMEOUT)
 *   - WapiInvalidResponseError (WAPI_INVALID_RESPONSE)
 */

import { ZoneLockError } from "./base.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class WapiError extends ZoneLockError {
  abstract readonly url: string;
}

// ---------------------------------------------------------------------------
// Concrete Errors
// ---------------------------------------------------------------------------

export class WapiRequestError extends WapiError {
  readonly code = "WAPI_REQUEST_FAILED" as const;
  readonly url: string;
  readonly status: number;
  readonly body: string;

  constructor(url: string, status: number, body: string) {
    super(`HTTP response: ${status}`, { status: String(status) });
    this.url = url;
    this.status = status;
    this.body = body;
  }
}

export class WapiNetworkError extends WapiError {
  readonly code = "WAPI_NETWORK_ERROR" as const;
  readonly url: string;

  constructor(url: string, message: string, cause?: Error) {
    super(`Network error: ${message}`, undefined, cause ? { cause } : undefined);
    this.url = url;
  }
}

export class WapiTimeoutError extends WapiError {
  readonly code = "WAPI_TIMEOUT" as const;
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, { timeoutMs: String(timeoutMs) });
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

export class WapiInvalidResponseError extends WapiError {
  readonly code = "WAPI_INVALID_RESPONSE" as const;
  readonly url: string;
  readonly body: string;

  constructor(url: string, reason: string, body: string) {
    super(`Invalid response: ${reason}`);
    this.url = url;
    this.body = body;
  }
}
