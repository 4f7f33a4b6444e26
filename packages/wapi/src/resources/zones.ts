/**
 * Authoritative zone resource (`zone_auth`).
 */

import { createRequest } from "../http/request.js";
import type { QueryParams } from "../types/index.js";
import type { LockOperation, ZoneFilter, ZoneRecord } from "../types/zones.js";
import { ZoneRecordListSchema } from "../validation.js";
import { BaseResource } from "./base.js";

export const ZONE_OBJECT_TYPE = "zone_auth";

/** Fields requested on every zone query */
export const ZONE_RETURN_FIELDS = ["fqdn", "locked", "locked_by"] as const;

/**
 * Resource for querying and locking authoritative zones.
 */
export class ZonesResource extends BaseResource {
  /**
   * List zones with their lock state.
   *
   * @param filter - Restrict to a zone name and/or view
   * @returns Zone records exactly as the server reported them
   */
  async list(filter?: ZoneFilter): Promise<ZoneRecord[]> {
    const params: [string, string][] = [["_return_fields", ZONE_RETURN_FIELDS.join(",")]];
    if (filter?.fqdn) params.push(["fqdn", filter.fqdn]);
    if (filter?.view) params.push(["view", filter.view]);

    return this.http.sendJson(createRequest("GET", ZONE_OBJECT_TYPE, params), ZoneRecordListSchema);
  }

  /**
   * Call the `lock_unlock_zone` function on a zone.
   *
   * @param zoneRef - Object reference of the zone
   * @param operation - LOCK or UNLOCK
   * @returns Raw response body; WAPI answers `{}` on success
   */
  async lockUnlock(zoneRef: string, operation: LockOperation): Promise<string> {
    const params: QueryParams = [
      ["_function", "lock_unlock_zone"],
      ["operation", operation],
    ];
    const response = await this.http.send(createRequest("POST", zoneRef, params));
    return response.body;
  }
}
