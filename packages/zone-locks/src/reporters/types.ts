import type { ZoneRecord } from "@zone-locks/wapi";

/**
 * Reporter interface for writing zone status to stdout.
 */
export interface ZoneReporter {
  readonly name: string;
  report(zones: readonly ZoneRecord[]): string;
}
