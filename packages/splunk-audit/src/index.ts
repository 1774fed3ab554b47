// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @query-audit/splunk-audit — audit trail for executed queries, delivered to
 * a Splunk HTTP Event Collector.
 *
 * Public API surface:
 *
 * Sink
 *   SplunkAuditSink    — write(record) → one HEC round trip per query
 *   withIndex, withHttpClient, withUserAgent, withEventEmitter — construction options
 *
 * Building blocks
 *   buildEnvelope      — fixed-order JSON event envelope
 *   FetchHttpClient    — default HttpClient on the global fetch
 *   buildHeaders, createRequest, sendEnvelope
 *   decodeAck, interpretAck
 *
 * Config (Zod schema + env loading)
 *   SinkConfigSchema, parseSinkConfig, loadSinkConfigFromEnv, SINK_ENV_VARS
 *
 * Events
 *   AuditSinkEventEmitter, EVENT_AUDIT_WRITTEN, EVENT_AUDIT_FAILED
 *
 * Errors
 *   AuditSinkError, RequestConstructionError, SendError,
 *   ResponseDecodeError, CollectorRejectionError, InvalidConfigError
 */

// ---------------------------------------------------------------------------
// Sink
// ---------------------------------------------------------------------------
export {
  SplunkAuditSink,
  withIndex,
  withHttpClient,
  withUserAgent,
  withEventEmitter,
} from './sink.js';
export type { AuditSink, SinkOption } from './sink.js';

// ---------------------------------------------------------------------------
// Envelope, transport, acknowledgment
// ---------------------------------------------------------------------------
export { buildEnvelope, EVENT_SOURCETYPE } from './envelope.js';
export {
  FetchHttpClient,
  createDefaultHttpClient,
  buildHeaders,
  createRequest,
  sendEnvelope,
  DEFAULT_TIMEOUT_MS,
} from './transport.js';
export type { HttpClient, HttpRequest, HttpResponse, FetchHttpClientOptions } from './transport.js';
export { CollectorAckSchema, decodeAck, interpretAck } from './response.js';

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------
export { SinkConfigSchema, SINK_ENV_VARS, parseSinkConfig, loadSinkConfigFromEnv } from './config.js';

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------
export { AuditSinkEventEmitter, EVENT_AUDIT_WRITTEN, EVENT_AUDIT_FAILED } from './events.js';
export type {
  AuditSinkEventEmitterOptions,
  AuditSinkEventName,
  AuditSinkEventListener,
  AuditSinkEventPayloadMap,
  AuditWrittenEventPayload,
  AuditFailedEventPayload,
} from './events.js';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------
export {
  AuditSinkError,
  RequestConstructionError,
  SendError,
  ResponseDecodeError,
  CollectorRejectionError,
  InvalidConfigError,
} from './errors.js';
export type { AuditSinkErrorCode } from './errors.js';

// ---------------------------------------------------------------------------
// Types & version
// ---------------------------------------------------------------------------
export type { QueryRecord, SinkConfig, AuditEvent, CollectorAck } from './types.js';
export { PRODUCT_NAME, PRODUCT_VERSION, userAgent } from './version.js';
