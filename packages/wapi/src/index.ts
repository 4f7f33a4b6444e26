/**
 * @zone-locks/wapi - Client for the WAPI REST management API
 *
 * @example
 * ```typescript
 * import { WapiClient } from "@zone-locks/wapi";
 *
 * const client = new WapiClient({ host, apiVersion, username, password, validateCert });
 * const body = await client.zones.lockUnlock(zone._ref, "LOCK");
 * ```
 */

// Main client
export { WapiClient } from "./client.js";
// HTTP
export { HttpClient, wapiBaseUrl } from "./http/index.js";
export { appendParams, buildUrl, createRequest, encodeQueryComponent } from "./http/request.js";
export {
  createUndiciTransport,
  type Transport,
  type TransportRequest,
  type TransportResponse,
  type UndiciTransportOptions,
} from "./http/transport.js";
// Resources
export { BaseResource } from "./resources/base.js";
export { ZONE_OBJECT_TYPE, ZONE_RETURN_FIELDS, ZonesResource } from "./resources/zones.js";
// Types
export type {
  ClientConfig,
  HttpMethod,
  LockOperation,
  QueryParams,
  WapiConfig,
  WapiRequest,
  WapiResponse,
  ZoneFilter,
  ZoneRecord,
} from "./types/index.js";
// Validation
export { ZoneRecordListSchema, ZoneRecordSchema } from "./validation.js";
