/**
 * Zone lock controller: turns lock / unlock / query intents into WAPI calls
 * and interprets the answers. Failures never escape; they are logged and
 * reported as `ok: false` results or `false`.
 */

import {
  getErrorMessage,
  WapiInvalidResponseError,
  WapiRequestError,
  wrapError,
  type ZoneLockError,
  ZoneOperationRejectedError,
  ZoneResolutionError,
} from "@zone-locks/errors";
import {
  type ClientConfig,
  type LockOperation,
  WapiClient,
  type ZoneFilter,
  type ZoneRecord,
} from "@zone-locks/wapi";

import { loadConfig } from "./config.js";
import type { Logger } from "./logger.js";

/**
 * Zone to act on: an object reference, or a name (and optional view) to
 * resolve into one. A reference takes precedence.
 */
export interface ZoneTarget {
  readonly fqdn?: string;
  readonly zoneRef?: string;
  readonly view?: string;
}

export type ZoneQueryResult =
  | { readonly ok: true; readonly zones: readonly ZoneRecord[] }
  | { readonly ok: false; readonly error: ZoneLockError };

export type ZoneLockResult =
  | { readonly ok: true; readonly zoneRef: string; readonly operation: LockOperation }
  | { readonly ok: false; readonly error: ZoneLockError };

/**
 * Session settings the INI file does not carry.
 */
export type ControllerOptions = Pick<ClientConfig, "timeoutMs" | "transport">;

const OPERATION_WORDING: Readonly<Record<LockOperation, { ing: string; done: string }>> = {
  LOCK: { ing: "locking", done: "locked" },
  UNLOCK: { ing: "unlocking", done: "unlocked" },
};

/** Body WAPI returns when lock_unlock_zone succeeds */
const SUCCESS_BODY = "{}";

export class ZoneLockController {
  private readonly client: WapiClient;
  private readonly logger: Logger;

  constructor(client: WapiClient, logger: Logger) {
    this.client = client;
    this.logger = logger;
  }

  /**
   * Load the INI file and open a session with its settings.
   */
  static async fromConfigFile(
    configPath: string,
    logger: Logger,
    options: ControllerOptions = {},
  ): Promise<ZoneLockController> {
    const config = await loadConfig(configPath, logger);
    const client = new WapiClient({ ...config, ...options });
    return new ZoneLockController(client, logger);
  }

  /**
   * Fetch zones with their lock state. Zero matches is a success with an
   * empty list; a failed request is `ok: false`.
   */
  async queryZones(filter?: ZoneFilter): Promise<ZoneQueryResult> {
    this.logger.info("Retrieving zone data");
    try {
      const zones = await this.client.zones.list(filter);
      this.logger.info("Zone data retrieved successfully");
      this.logger.debug(`Response: ${JSON.stringify(zones)}`);
      return { ok: true, zones };
    } catch (error) {
      const failure = wrapError(error);
      this.logResponseDetails(failure);
      this.logger.error("Failed to retrieve zone data");
      return { ok: false, error: failure };
    }
  }

  /**
   * Same as {@link queryZones}, with a failed request folded into `[]`.
   */
  async listZones(filter?: ZoneFilter): Promise<readonly ZoneRecord[]> {
    const result = await this.queryZones(filter);
    return result.ok ? result.zones : [];
  }

  async lockZone(target: ZoneTarget): Promise<boolean> {
    const result = await this.setZoneLock(target, "LOCK");
    return result.ok;
  }

  async unlockZone(target: ZoneTarget): Promise<boolean> {
    const result = await this.setZoneLock(target, "UNLOCK");
    return result.ok;
  }

  /**
   * Lock or unlock one zone. A name must resolve to exactly one zone;
   * otherwise nothing is sent. Success means a 2xx answer whose body is `{}`.
   */
  async setZoneLock(target: ZoneTarget, operation: LockOperation): Promise<ZoneLockResult> {
    const wording = OPERATION_WORDING[operation];

    let zoneRef = target.zoneRef;
    if (!zoneRef) {
      const resolved = await this.resolveZoneRef(target);
      if (!resolved.ok) {
        this.logger.error(resolved.error.message);
        return resolved;
      }
      zoneRef = resolved.zoneRef;
    }

    let body: string;
    try {
      body = await this.client.zones.lockUnlock(zoneRef, operation);
    } catch (error) {
      const failure = wrapError(error);
      this.logResponseDetails(failure);
      this.logger.error(`Error ${wording.ing} zone: ${failure.message}`);
      return { ok: false, error: failure };
    }

    if (body.trim() === SUCCESS_BODY) {
      this.logger.info(`Zone ${wording.done}`);
      return { ok: true, zoneRef, operation };
    }

    this.logger.error(`Error ${wording.ing} zone: ${body}`);
    return { ok: false, error: new ZoneOperationRejectedError(zoneRef, operation, body) };
  }

  /**
   * Release the session.
   */
  async close(): Promise<void> {
    try {
      await this.client.close();
    } catch (error) {
      this.logger.warn(`Closing session failed: ${getErrorMessage(error)}`);
    }
  }

  private async resolveZoneRef(
    target: ZoneTarget,
  ): Promise<{ ok: true; zoneRef: string } | { ok: false; error: ZoneResolutionError }> {
    const fqdn = target.fqdn ?? "";
    if (!fqdn) {
      return { ok: false, error: new ZoneResolutionError(fqdn, 0) };
    }

    const result = await this.queryZones({
      fqdn,
      ...(target.view ? { view: target.view } : {}),
    });

    if (!result.ok) {
      return { ok: false, error: new ZoneResolutionError(fqdn, 0, result.error) };
    }

    const [zone, ...rest] = result.zones;
    if (zone === undefined || rest.length > 0) {
      return { ok: false, error: new ZoneResolutionError(fqdn, result.zones.length) };
    }
    return { ok: true, zoneRef: zone._ref };
  }

  private logResponseDetails(error: ZoneLockError): void {
    if (error instanceof WapiRequestError) {
      this.logger.debug(`HTTP response: ${error.status}`);
      this.logger.debug(`Body: ${error.body}`);
    } else if (error instanceof WapiInvalidResponseError) {
      this.logger.debug(error.message);
      this.logger.debug(`Body: ${error.body}`);
    } else {
      this.logger.debug(error.message);
    }
  }
}
