/**
 * @zone-locks/errors
 *
 * Shared error taxonomy for the zone-locks packages.
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific condition. Use `error.code === "XXX"` for fine-grained
 * matching, or `instanceof WapiError` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { InternalError, isZoneLockError, ZoneLockError } from "./base.js";

export {
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export { getErrorMessage, isSuccessStatus, wrapError } from "./utils.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export { ConfigFileUnreadableError } from "./config.js";

export {
  WapiError,
  WapiInvalidResponseError,
  WapiNetworkError,
  WapiRequestError,
  WapiTimeoutError,
} from "./wapi.js";

export { ZoneOperationRejectedError, ZoneResolutionError } from "./zone.js";
