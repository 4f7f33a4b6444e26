import { ERROR_CATALOG, type ErrorCode, type ErrorDomain } from "./catalog.js";

/**
 * Abstract base for every error raised by the zone-locks packages.
 *
 * Subclasses pin `code` to a catalog entry; `domain` and `isExpected`
 * are read from the catalog so they can never disagree with it.
 */
export abstract class ZoneLockError extends Error {
  abstract readonly code: ErrorCode;
  readonly timestamp: Date;
  readonly metadata?: Record<string, string>;

  constructor(message: string, metadata?: Record<string, string>, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    if (metadata !== undefined) {
      this.metadata = metadata;
    }
  }

  get domain(): ErrorDomain {
    return ERROR_CATALOG[this.code].domain;
  }

  get isExpected(): boolean {
    return ERROR_CATALOG[this.code].isExpected;
  }
}

/**
 * Catch-all for failures that are not otherwise classified.
 */
export class InternalError extends ZoneLockError {
  readonly code = "INTERNAL_ERROR" as const;
}

export function isZoneLockError(error: unknown): error is ZoneLockError {
  return error instanceof ZoneLockError;
}
