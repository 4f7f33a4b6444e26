/**
 * Common types and interfaces for @zone-locks/wapi
 */

import type { Transport } from "../http/transport.js";

/**
 * Connection settings for one Grid Master.
 */
export interface WapiConfig {
  /**
   * Grid Master host name or address
   */
  readonly host: string;

  /**
   * WAPI version segment of the base URL, e.g. "v2.12"
   */
  readonly apiVersion: string;

  /**
   * Basic auth user
   */
  readonly username: string;

  /**
   * Basic auth password
   */
  readonly password: string;

  /**
   * Verify the server certificate
   * @default false
   */
  readonly validateCert: boolean;
}

/**
 * Configuration options for WapiClient
 */
export interface ClientConfig extends WapiConfig {
  /**
   * Request timeout in milliseconds. Unset means the transport's own default.
   */
  readonly timeoutMs?: number;

  /**
   * Transport used to send requests
   * @default undici fetch with a TLS-aware Agent
   */
  readonly transport?: Transport;
}

/**
 * HTTP methods used against WAPI
 */
export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/**
 * Ordered query parameters. Order is preserved on the wire.
 */
export type QueryParams = readonly (readonly [name: string, value: string])[];

/**
 * A single WAPI call.
 */
export interface WapiRequest {
  readonly method: HttpMethod;

  /**
   * Object type ("zone_auth") or object reference, relative to the base URL
   */
  readonly path: string;

  readonly params?: QueryParams;

  /**
   * Request body (will be JSON serialized)
   */
  readonly body?: unknown;
}

/**
 * Raw response of a successful (2xx) call.
 */
export interface WapiResponse {
  readonly status: number;
  readonly body: string;
}

export type { LockOperation, ZoneFilter, ZoneRecord } from "./zones.js";
