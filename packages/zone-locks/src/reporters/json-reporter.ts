import type { ZoneRecord } from "@zone-locks/wapi";

import type { ZoneReporter } from "./types.js";

/**
 * Renders the zone records as formatted JSON.
 */
export class JsonReporter implements ZoneReporter {
  readonly name = "json";

  report(zones: readonly ZoneRecord[]): string {
    return JSON.stringify(zones, null, 2);
  }
}
