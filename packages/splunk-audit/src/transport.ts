// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { RequestConstructionError, SendError } from './errors.js';
import type { SinkConfig } from './types.js';

/** Timeout applied by the client the sink installs when none is supplied. */
export const DEFAULT_TIMEOUT_MS = 10_000;

const INVALID_ESCAPE = /%(?![0-9A-Fa-f]{2})/;
// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTER = /[\u0000-\u001f\u007f]/;

/** A fully built outbound request.  The URL is kept exactly as configured. */
export interface HttpRequest {
  readonly method: 'POST';
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
}

/** Status and complete body of a finished HTTP exchange. */
export interface HttpResponse {
  readonly status: number;
  readonly body: string;
}

/**
 * Minimal HTTP client interface.
 *
 * Implementations reject only when no exchange took place (bad URL scheme,
 * DNS failure, refused connection, timeout).  Any HTTP status resolves, with
 * the whole body read.
 */
export interface HttpClient {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/** Options for {@link FetchHttpClient}. */
export interface FetchHttpClientOptions {
  /** Per-request timeout in milliseconds.  No timeout when omitted. */
  readonly timeoutMs?: number;
  /** Fetch implementation.  Defaults to the global `fetch`. */
  readonly fetch?: typeof fetch;
}

/** {@link HttpClient} on top of the WHATWG `fetch` API. */
export class FetchHttpClient implements HttpClient {
  readonly timeoutMs: number | undefined;
  readonly #fetch: typeof fetch;

  constructor(options: FetchHttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs;
    this.#fetch = options.fetch ?? globalThis.fetch;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const response = await this.#fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: this.timeoutMs === undefined ? undefined : AbortSignal.timeout(this.timeoutMs),
    });
    return { status: response.status, body: await response.text() };
  }
}

/** The client a sink uses until another one is installed. */
export function createDefaultHttpClient(): FetchHttpClient {
  return new FetchHttpClient({ timeoutMs: DEFAULT_TIMEOUT_MS });
}

/**
 * The fixed header set sent with every event.  An empty token still yields
 * the `Splunk ` scheme prefix, trailing space included.
 */
export function buildHeaders(token: string, userAgent: string): Record<string, string> {
  return {
    Accept: 'application/json',
    'Accept-Encoding': 'gzip',
    Authorization: `Splunk ${token}`,
    'Content-Type': 'application/json; charset=utf-8',
    'User-Agent': userAgent,
  };
}

/**
 * Build the POST request for `endpoint`.
 *
 * Throws when a non-empty endpoint cannot be a request URL: an invalid
 * percent-escape, a control character, or anything the URL parser rejects
 * (unclosed IPv6 bracket, invalid host character, out-of-range port).  An
 * empty endpoint passes here and fails when sent.
 */
export function createRequest(
  endpoint: string,
  body: string,
  headers: Readonly<Record<string, string>>,
): HttpRequest {
  if (CONTROL_CHARACTER.test(endpoint)) {
    throw new TypeError(`invalid control character in URL ${JSON.stringify(endpoint)}`);
  }
  const escape = INVALID_ESCAPE.exec(endpoint);
  if (escape !== null) {
    const sequence = endpoint.slice(escape.index, escape.index + 3);
    throw new TypeError(`invalid URL escape ${JSON.stringify(sequence)}`);
  }
  if (endpoint !== '') {
    // Throws TypeError for an unparseable URL.
    new URL(endpoint);
  }
  return { method: 'POST', url: endpoint, headers, body };
}

/**
 * Deliver one envelope and return the raw acknowledgment body.
 *
 * @throws {RequestConstructionError} when the endpoint is malformed.
 * @throws {SendError} when the exchange fails.
 */
export async function sendEnvelope(
  client: HttpClient,
  config: SinkConfig,
  userAgent: string,
  envelope: string,
): Promise<HttpResponse> {
  let request: HttpRequest;
  try {
    request = createRequest(config.endpoint, envelope, buildHeaders(config.token, userAgent));
  } catch (error: unknown) {
    throw new RequestConstructionError(error);
  }

  try {
    return await client.send(request);
  } catch (error: unknown) {
    throw new SendError(error);
  }
}
