/**
 * Main WAPI client
 */

import { HttpClient } from "./http/index.js";
import { ZonesResource } from "./resources/zones.js";
import type { ClientConfig } from "./types/index.js";

/**
 * WAPI client
 *
 * @example
 * ```typescript
 * const client = new WapiClient({
 *   host: "gm.example.com",
 *   apiVersion: "v2.12",
 *   username: "admin",
 *   password: "test-secret",
 *   validateCert: false,
 * });
 *
 * const zones = await client.zones.list({ fqdn: "example.com" });
 * await client.close();
 * ```
 */
export class WapiClient {
  private readonly _http: HttpClient;

  /**
   * Authoritative zones resource
   */
  public readonly zones: ZonesResource;

  constructor(config: ClientConfig) {
    this._http = new HttpClient(config);
    this.zones = new ZonesResource(this._http);
  }

  get baseUrl(): string {
    return this._http.baseUrl;
  }

  /**
   * Release pooled connections. The client must not be used afterwards.
   */
  close(): Promise<void> {
    return this._http.close();
  }
}
