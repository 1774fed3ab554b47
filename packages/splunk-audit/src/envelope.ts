// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { AuditEvent, QueryRecord, SinkConfig } from './types.js';

/** Splunk's built-in source type for structured JSON events. */
export const EVENT_SOURCETYPE = '_json';

/**
 * Serialise one query record into the HEC event envelope.
 *
 * Key order is fixed: `event`, `sourcetype`, `host`, `time`, then `index`
 * only when one is configured.  Inside `event` the order is `query`, `user`,
 * `namespace`, `pod`.  The collector extracts indexed fields by position.
 */
export function buildEnvelope(record: QueryRecord, config: SinkConfig): string {
  const event: AuditEvent = {
    query: record.query,
    user: record.user,
    namespace: config.namespace,
    pod: config.pod,
  };

  const envelope: Record<string, unknown> = {
    event,
    sourcetype: EVENT_SOURCETYPE,
    host: config.host,
    time: record.timestamp,
  };
  if (config.index !== undefined && config.index !== '') {
    envelope['index'] = config.index;
  }

  return JSON.stringify(envelope);
}
