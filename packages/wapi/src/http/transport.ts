/**
 * Transport seam between HttpClient and the network.
 */

import { Agent, fetch } from "undici";
import type { HttpMethod } from "../types/index.js";

export interface TransportRequest {
  readonly method: HttpMethod;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string;
  readonly signal?: AbortSignal;
}

export interface TransportResponse {
  readonly status: number;
  text(): Promise<string>;
}

export interface Transport {
  send(url: string, request: TransportRequest): Promise<TransportResponse>;

  /**
   * Release pooled connections
   */
  close?(): Promise<void>;
}

export interface UndiciTransportOptions {
  readonly validateCert: boolean;
}

/**
 * Default transport: undici fetch over a dedicated Agent, so certificate
 * validation can be switched off for self-signed appliances without
 * touching the process-wide TLS settings.
 */
export function createUndiciTransport(options: UndiciTransportOptions): Transport {
  const dispatcher = new Agent({
    connect: { rejectUnauthorized: options.validateCert },
  });

  return {
    send(url, request) {
      return fetch(url, {
        method: request.method,
        headers: { ...request.headers },
        dispatcher,
        ...(request.body !== undefined ? { body: request.body } : {}),
        ...(request.signal ? { signal: request.signal } : {}),
      });
    },

    close() {
      return dispatcher.close();
    },
  };
}
