/**
 * HTTP session for WAPI: basic auth, optional timeout, error classification
 */

import {
  getErrorMessage,
  isSuccessStatus,
  WapiInvalidResponseError,
  WapiNetworkError,
  WapiRequestError,
  WapiTimeoutError,
} from "@zone-locks/errors";
import type { ZodType } from "zod";
import type { ClientConfig, WapiRequest, WapiResponse } from "../types/index.js";
import { buildUrl } from "./request.js";
import { createUndiciTransport, type Transport, type TransportRequest } from "./transport.js";

/**
 * Base URL of the WAPI endpoint on a Grid Master
 */
export function wapiBaseUrl(host: string, apiVersion: string): string {
  return `https://${host}/wapi/${apiVersion}`;
}

function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, "utf-8").toString("base64")}`;
}

/**
 * HTTP client for making requests to WAPI. One instance per session;
 * not meant for concurrent use. No retries.
 */
export class HttpClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number | undefined;
  private readonly transport: Transport;
  private readonly defaultHeaders: Readonly<Record<string, string>>;

  constructor(config: ClientConfig) {
    this.baseUrl = wapiBaseUrl(config.host, config.apiVersion);
    this.timeoutMs = config.timeoutMs;
    this.transport = config.transport ?? createUndiciTransport({ validateCert: config.validateCert });
    this.defaultHeaders = {
      "Content-Type": "application/json",
      Authorization: basicAuth(config.username, config.password),
    };
  }

  /**
   * Send a request and return the raw body of a 2xx response.
   *
   * @throws WapiRequestError on a non-2xx status
   * @throws WapiTimeoutError when `timeoutMs` elapses
   * @throws WapiNetworkError when the request cannot be completed
   */
  async send(request: WapiRequest): Promise<WapiResponse> {
    const url = buildUrl(this.baseUrl, request);
    const init: TransportRequest = {
      method: request.method,
      headers: this.defaultHeaders,
      ...(request.body !== undefined ? { body: JSON.stringify(request.body) } : {}),
    };

    const response = await this.dispatch(url, init);

    if (!isSuccessStatus(response.status)) {
      throw new WapiRequestError(url, response.status, response.body);
    }

    return response;
  }

  /**
   * Send a request and validate its JSON body against a schema.
   *
   * @throws WapiInvalidResponseError when the body is not JSON or does not match
   */
  async sendJson<T>(request: WapiRequest, schema: ZodType<T>): Promise<T> {
    const url = buildUrl(this.baseUrl, request);
    const { body } = await this.send(request);

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new WapiInvalidResponseError(url, `body is not JSON (${getErrorMessage(error)})`, body);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
        .join("; ");
      throw new WapiInvalidResponseError(url, issues, body);
    }
    return parsed.data;
  }

  /**
   * Release the transport's connections
   */
  async close(): Promise<void> {
    await this.transport.close?.();
  }

  private async dispatch(url: string, init: TransportRequest): Promise<WapiResponse> {
    const timeoutMs = this.timeoutMs;
    if (timeoutMs === undefined) {
      return this.exchange(url, init);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await this.exchange(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new WapiTimeoutError(url, timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async exchange(url: string, init: TransportRequest): Promise<WapiResponse> {
    try {
      const response = await this.transport.send(url, init);
      const body = await response.text();
      return { status: response.status, body };
    } catch (error) {
      throw new WapiNetworkError(
        url,
        getErrorMessage(error),
        error instanceof Error ? error : undefined,
      );
    }
  }
}
