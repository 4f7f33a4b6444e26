/**
 * Orchestration: status reporting, single-zone control and the all-zone
 * batch. Thin callers of ZoneLockController.
 */

import type { ZoneRecord } from "@zone-locks/wapi";

import type { ZoneLockController } from "./controller.js";
import type { Logger } from "./logger.js";

export type LockIntent = "lock" | "unlock" | "none";

/**
 * Resolve the two flags into one intent. Unlock overrides lock.
 */
export function resolveIntent(lock: boolean, unlock: boolean): LockIntent {
  if (unlock) return "unlock";
  if (lock) return "lock";
  return "none";
}

/**
 * One human-readable status line for a zone.
 */
export function formatZoneStatus(zone: ZoneRecord): string {
  const line = `Zone: ${zone.fqdn}, Locked: ${zone.locked}`;
  return zone.locked ? `${line}, Locked by: ${zone.locked_by ?? "unknown"}` : line;
}

export interface ReportOptions {
  readonly zone?: string;
  readonly view?: string;
}

/**
 * Query zones (all, or the named one) and log one status line per zone.
 *
 * @returns the zones reported, empty when none matched or the query failed
 */
export async function reportLockStatus(
  controller: ZoneLockController,
  logger: Logger,
  options: ReportOptions = {},
): Promise<readonly ZoneRecord[]> {
  const zones = await controller.listZones({
    ...(options.zone ? { fqdn: options.zone } : {}),
    ...(options.view ? { view: options.view } : {}),
  });

  if (zones.length === 0) {
    logger.info("No matching zones found.");
    return zones;
  }

  for (const zone of zones) {
    logger.info(formatZoneStatus(zone));
  }
  return zones;
}

export interface ControlOptions {
  readonly zone?: string;
  readonly zoneRef?: string;
  readonly view?: string;
  readonly lock: boolean;
  readonly unlock: boolean;
}

/**
 * Lock or unlock one zone named by fqdn or object reference.
 *
 * @returns false when neither flag is set or the operation failed
 */
export async function controlZoneLock(
  controller: ZoneLockController,
  options: ControlOptions,
): Promise<boolean> {
  const target = {
    ...(options.zone ? { fqdn: options.zone } : {}),
    ...(options.zoneRef ? { zoneRef: options.zoneRef } : {}),
    ...(options.view ? { view: options.view } : {}),
  };

  switch (resolveIntent(options.lock, options.unlock)) {
    case "lock":
      return controller.lockZone(target);
    case "unlock":
      return controller.unlockZone(target);
    case "none":
      return false;
  }
}

export interface BatchOptions {
  readonly lock: boolean;
  readonly unlock: boolean;
  readonly view?: string;
}

export interface BatchSummary {
  readonly total: number;
  /** Zones whose lock call succeeded */
  readonly changed: number;
  /** Zones already in the requested state */
  readonly skipped: number;
  readonly failed: number;
}

/**
 * Apply the intent to every zone, one at a time. Zones already in the
 * requested state get no call. Every zone is reported after its turn,
 * and a failure on one zone does not stop the rest.
 */
export async function processAllZones(
  controller: ZoneLockController,
  logger: Logger,
  options: BatchOptions,
): Promise<BatchSummary> {
  const intent = resolveIntent(options.lock, options.unlock);
  const zones = await controller.listZones(options.view ? { view: options.view } : undefined);

  let changed = 0;
  let skipped = 0;
  let failed = 0;

  for (const zone of zones) {
    const needsCall =
      (intent === "lock" && !zone.locked) || (intent === "unlock" && zone.locked);

    if (needsCall) {
      const target = { zoneRef: zone._ref };
      const ok =
        intent === "lock" ? await controller.lockZone(target) : await controller.unlockZone(target);
      if (ok) {
        changed++;
      } else {
        failed++;
      }
    } else {
      skipped++;
    }

    await reportLockStatus(controller, logger, {
      zone: zone.fqdn,
      ...(options.view ? { view: options.view } : {}),
    });
  }

  const summary: BatchSummary = { total: zones.length, changed, skipped, failed };
  logger.info(
    `Processed ${summary.total} zones: ${changed} changed, ${skipped} skipped, ${failed} failed`,
  );
  return summary;
}
