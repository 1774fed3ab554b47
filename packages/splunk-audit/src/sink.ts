// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { buildEnvelope } from './envelope.js';
import { AuditSinkError } from './errors.js';
import { EVENT_AUDIT_FAILED, EVENT_AUDIT_WRITTEN } from './events.js';
import type { AuditSinkEventEmitter } from './events.js';
import { interpretAck } from './response.js';
import { createDefaultHttpClient, sendEnvelope } from './transport.js';
import type { HttpClient } from './transport.js';
import type { QueryRecord, SinkConfig } from './types.js';
import { userAgent } from './version.js';

/** Anything that can record an executed query. */
export interface AuditSink {
  write(record: QueryRecord): Promise<void>;
}

/** Construction-time mutator, applied once in the order given. */
export type SinkOption = (sink: SplunkAuditSink) => void;

/** Send events to a specific collector index. */
export function withIndex(index: string): SinkOption {
  return (sink) => {
    sink.config.index = index;
  };
}

/** Use `client` instead of the default fetch client. */
export function withHttpClient(client: HttpClient): SinkOption {
  return (sink) => {
    sink.setHttpClient(client);
  };
}

/** Override the product identity sent as `User-Agent`. */
export function withUserAgent(product: string, version: string): SinkOption {
  return (sink) => {
    sink.userAgent = userAgent(product, version);
  };
}

/** Publish write lifecycle events on `emitter`. */
export function withEventEmitter(emitter: AuditSinkEventEmitter): SinkOption {
  return (sink) => {
    sink.eventEmitter = emitter;
  };
}

/**
 * Delivers one query record per call to a Splunk HTTP Event Collector.
 *
 * Every `write()` is a single round trip with no buffering or retry; the
 * promise settles with the outcome of that round trip and the sink stays
 * usable after a failure.  Concurrent writes are fine.  `setHttpClient()` and
 * the public fields are meant to be set up before the first write and must
 * not change while writes are in flight.
 *
 * @example
 * ```ts
 * const sink = new SplunkAuditSink(loadSinkConfigFromEnv(), withIndex('queries'));
 * await sink.write({ query: 'select 1;', user: 'alice', timestamp: 1672531200 });
 * ```
 */
export class SplunkAuditSink implements AuditSink {
  /** Sink-owned copy of the configuration passed to the constructor. */
  readonly config: SinkConfig;
  userAgent: string;
  eventEmitter: AuditSinkEventEmitter | undefined;
  #httpClient: HttpClient;

  constructor(config: SinkConfig, ...options: SinkOption[]) {
    this.config = { ...config };
    this.userAgent = userAgent();
    this.eventEmitter = undefined;
    this.#httpClient = createDefaultHttpClient();

    for (const option of options) {
      option(this);
    }
  }

  get httpClient(): HttpClient {
    return this.#httpClient;
  }

  /** Replace the HTTP client.  Not safe while writes are in flight. */
  setHttpClient(client: HttpClient): void {
    this.#httpClient = client;
  }

  /**
   * @throws {RequestConstructionError} when the endpoint is malformed.
   * @throws {SendError} when the request could not be delivered.
   * @throws {ResponseDecodeError} when the acknowledgment is not valid JSON.
   * @throws {CollectorRejectionError} when the collector returned a non-zero code.
   */
  async write(record: QueryRecord): Promise<void> {
    const startedAt = performance.now();
    const envelope = buildEnvelope(record, this.config);

    let status: number;
    try {
      const response = await sendEnvelope(this.#httpClient, this.config, this.userAgent, envelope);
      interpretAck(response.body);
      status = response.status;
    } catch (error: unknown) {
      if (error instanceof AuditSinkError) {
        this.eventEmitter?.emit(EVENT_AUDIT_FAILED, {
          user: record.user,
          timestamp: record.timestamp,
          errorCode: error.code,
          message: error.message,
          durationMs: performance.now() - startedAt,
        });
      }
      throw error;
    }

    this.eventEmitter?.emit(EVENT_AUDIT_WRITTEN, {
      user: record.user,
      timestamp: record.timestamp,
      status,
      durationMs: performance.now() - startedAt,
    });
  }
}
