/**
 * Authoritative zone types.
 */

/**
 * Snapshot of one authoritative zone as returned by WAPI.
 */
export interface ZoneRecord {
  /**
   * Opaque server-assigned object reference
   */
  readonly _ref: string;
  readonly fqdn: string;
  readonly locked: boolean;

  /**
   * Identity holding the lock; only present while locked
   */
  readonly locked_by?: string;
}

/**
 * Query filter for zone lookups.
 */
export interface ZoneFilter {
  readonly fqdn?: string;

  /**
   * DNS view the zone lives in
   */
  readonly view?: string;
}

export type LockOperation = "LOCK" | "UNLOCK";
