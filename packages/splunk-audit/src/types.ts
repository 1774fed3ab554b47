// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * One executed query, as handed over by the query-execution service.
 * No field is validated; empty strings and a zero timestamp are sent as-is.
 */
export interface QueryRecord {
  /** Text of the executed statement. */
  readonly query: string;
  /** Identity of the invoking user. */
  readonly user: string;
  /** Integer epoch seconds. */
  readonly timestamp: number;
}

/**
 * Collector location, credential and the deployment identifiers attached to
 * every event.  The sink keeps its own copy, which construction options may
 * change before first use.
 */
export interface SinkConfig {
  /** Base URL of the HTTP Event Collector. */
  endpoint: string;
  /** HEC token; an empty token yields an unauthenticated request. */
  token: string;
  host: string;
  namespace: string;
  pod: string;
  /** Target index. Only sent when non-empty. */
  index?: string;
}

/** Body of the event carried inside the envelope. */
export interface AuditEvent {
  readonly query: string;
  readonly user: string;
  readonly namespace: string;
  readonly pod: string;
}

/** Decoded collector acknowledgment. `code === 0` means accepted. */
export interface CollectorAck {
  readonly code: number;
  readonly text: string;
}
