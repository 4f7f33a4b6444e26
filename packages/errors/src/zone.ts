/**
 * Zone errors - lock / unlock semantics
 *
 * Concrete:
 *   - ZoneResolutionError        (ZONE_NOT_RESOLVED)
 *   - ZoneOperationRejectedError (ZONE_OPERATION_REJECTED)
 */

import { ZoneLockError } from "./base.js";

export class ZoneResolutionError extends ZoneLockError {
  readonly code = "ZONE_NOT_RESOLVED" as const;
  readonly fqdn: string;
  readonly matches: number;

  constructor(fqdn: string, matches: number, cause?: Error) {
    super(`Cannot proceed: ${matches} zone matches`, { fqdn }, cause ? { cause } : undefined);
    this.fqdn = fqdn;
    this.matches = matches;
  }
}

export class ZoneOperationRejectedError extends ZoneLockError {
  readonly code = "ZONE_OPERATION_REJECTED" as const;
  readonly zoneRef: string;
  readonly operation: string;
  readonly body: string;

  constructor(zoneRef: string, operation: string, body: string) {
    super(`Zone ${operation} rejected: ${body}`, { zoneRef, operation });
    this.zoneRef = zoneRef;
    this.operation = operation;
    this.body = body;
  }
}
