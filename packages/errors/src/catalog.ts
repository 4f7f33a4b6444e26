/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised by the zone-locks packages, with the domain it
 * belongs to and whether it is an expected operational condition.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: INTERNAL, CONFIG, WAPI, ZONE
 */

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - Bugs and unknown failures
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // CONFIG ERRORS - Reading the INI file
  // ============================================================================
  CONFIG_FILE_UNREADABLE: {
    domain: "config",
    isExpected: true,
    title: "Config file unreadable",
    description: "The configuration file exists but could not be read",
  },

  // ============================================================================
  // WAPI ERRORS - Talking to the management API
  // ============================================================================
  WAPI_REQUEST_FAILED: {
    domain: "wapi",
    isExpected: true,
    title: "WAPI request failed",
    description: "The management API answered with a non-2xx status",
  },
  WAPI_NETWORK_ERROR: {
    domain: "wapi",
    isExpected: true,
    title: "WAPI unreachable",
    description: "The request never reached the management API (DNS, TLS, connection)",
  },
  WAPI_TIMEOUT: {
    domain: "wapi",
    isExpected: true,
    title: "WAPI request timed out",
    description: "The management API did not answer within the configured timeout",
  },
  WAPI_INVALID_RESPONSE: {
    domain: "wapi",
    isExpected: false,
    title: "Invalid WAPI response",
    description: "The response body did not have the expected shape",
  },

  // ============================================================================
  // ZONE ERRORS - Lock / unlock semantics
  // ============================================================================
  ZONE_NOT_RESOLVED: {
    domain: "zone",
    isExpected: true,
    title: "Zone not resolved",
    description: "A zone name matched zero or several zones, so no reference could be chosen",
  },
  ZONE_OPERATION_REJECTED: {
    domain: "zone",
    isExpected: true,
    title: "Zone operation rejected",
    description: "The lock or unlock call returned something other than an empty object",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];
