/**
 * Request builder: turns a structured WapiRequest into a URL.
 */

import type { HttpMethod, QueryParams, WapiRequest } from "../types/index.js";

/**
 * Percent-encode a query name or value. Commas stay literal because WAPI
 * reads them as list separators (`_return_fields=fqdn,locked`).
 */
export function encodeQueryComponent(value: string): string {
  return encodeURIComponent(value).replace(/%2C/g, ",");
}

/**
 * Append parameters to a URL: `?` before the first, `&` before the rest.
 * A URL that already carries a query string continues it with `&`.
 */
export function appendParams(url: string, params: QueryParams): string {
  let result = url;
  let first = !url.includes("?");
  for (const [name, value] of params) {
    result += first ? "?" : "&";
    first = false;
    result += `${encodeQueryComponent(name)}=${encodeQueryComponent(value)}`;
  }
  return result;
}

/**
 * Build the full URL for a request relative to the WAPI base URL.
 *
 * Object references are used as-is in the path: they are already
 * URL-safe as issued by the server.
 */
export function buildUrl(baseUrl: string, request: Pick<WapiRequest, "path" | "params">): string {
  const base = baseUrl.replace(/\/+$/, "");
  const path = request.path.replace(/^\/+/, "");
  return appendParams(`${base}/${path}`, request.params ?? []);
}

/**
 * Convenience constructor for a WapiRequest.
 */
export function createRequest(
  method: HttpMethod,
  path: string,
  params: QueryParams = [],
  body?: unknown,
): WapiRequest {
  return {
    method,
    path,
    params,
    ...(body !== undefined ? { body } : {}),
  };
}
