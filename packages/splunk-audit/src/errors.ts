// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/** Machine-readable discriminator carried by every {@link AuditSinkError}. */
export type AuditSinkErrorCode =
  | 'REQUEST_CONSTRUCTION'
  | 'SEND_FAILED'
  | 'RESPONSE_DECODE'
  | 'COLLECTOR_REJECTED'
  | 'INVALID_CONFIG';

/**
 * Base class for all audit sink errors.
 *
 * Every error includes a machine-readable `code` that calling code can
 * switch on without parsing human-readable messages.  When the failure was
 * caused by a lower-level error, that error is kept as `cause` and its
 * message is appended to this one.
 */
export class AuditSinkError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: AuditSinkErrorCode;

  constructor(code: AuditSinkErrorCode, message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${describeCause(cause)}`, { cause });
    this.name = 'AuditSinkError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when the configured endpoint cannot be turned into an HTTP request,
 * e.g. it contains an invalid percent-escape.  Points at a configuration bug
 * rather than a connectivity problem.
 */
export class RequestConstructionError extends AuditSinkError {
  constructor(cause: unknown) {
    super('REQUEST_CONSTRUCTION', 'unable to create request to Splunk', cause);
    this.name = 'RequestConstructionError';
  }
}

/**
 * Thrown when the request could not be delivered: no endpoint configured,
 * unreachable host, refused connection or timeout.
 */
export class SendError extends AuditSinkError {
  constructor(cause: unknown) {
    super('SEND_FAILED', 'unable to send request to Splunk', cause);
    this.name = 'SendError';
  }
}

/** Thrown when the collector's acknowledgment body is not the expected JSON. */
export class ResponseDecodeError extends AuditSinkError {
  constructor(cause: unknown) {
    super('RESPONSE_DECODE', 'unable to unmarshal Splunk response', cause);
    this.name = 'ResponseDecodeError';
  }
}

/**
 * Thrown when the collector acknowledged the request with a non-zero code.
 *
 * `ackCode` and `ackText` are the values the collector returned, so callers
 * can tell an invalid token apart from a disabled collector or a bad index.
 */
export class CollectorRejectionError extends AuditSinkError {
  /** Status code from the acknowledgment body. Never 0. */
  readonly ackCode: number;
  /** Human-readable detail from the acknowledgment body. */
  readonly ackText: string;

  constructor(ackCode: number, ackText: string) {
    super('COLLECTOR_REJECTED', `unable to write to Splunk: code ${ackCode}: ${ackText}`);
    this.name = 'CollectorRejectionError';
    this.ackCode = ackCode;
    this.ackText = ackText;
  }
}

/**
 * Thrown when a sink configuration is structurally invalid.
 *
 * The `details` array carries one entry per validation error, formatted
 * `path: message` from Zod's issue list.
 */
export class InvalidConfigError extends AuditSinkError {
  /** Structured list of individual validation failures. */
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_CONFIG', `sink configuration is invalid: ${details.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.details = details;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
