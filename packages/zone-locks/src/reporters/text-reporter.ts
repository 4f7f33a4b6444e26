import type { ZoneRecord } from "@zone-locks/wapi";

import { formatZoneStatus } from "../orchestration.js";
import type { ZoneReporter } from "./types.js";

/**
 * One status line per zone, the same lines the log report uses.
 */
export class TextReporter implements ZoneReporter {
  readonly name = "text";

  report(zones: readonly ZoneRecord[]): string {
    if (zones.length === 0) {
      return "No matching zones found.";
    }
    return zones.map(formatZoneStatus).join("\n");
  }
}
