// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Write lifecycle notifications for a sink.
 *
 * ```ts
 * const emitter = new AuditSinkEventEmitter();
 * emitter.on(EVENT_AUDIT_FAILED, (payload) => {
 *   console.error(`audit write failed (${payload.errorCode}): ${payload.message}`);
 * });
 * const sink = new SplunkAuditSink(config, withEventEmitter(emitter));
 * ```
 */

import type { AuditSinkErrorCode } from './errors.js';

/** Emitted after the collector accepted an event. */
export const EVENT_AUDIT_WRITTEN = 'audit:written' as const;

/** Emitted after a write failed at any step. */
export const EVENT_AUDIT_FAILED = 'audit:failed' as const;

export type AuditSinkEventName = typeof EVENT_AUDIT_WRITTEN | typeof EVENT_AUDIT_FAILED;

export interface AuditWrittenEventPayload {
  readonly user: string;
  /** Timestamp of the audited query, epoch seconds. */
  readonly timestamp: number;
  /** HTTP status of the collector's response. */
  readonly status: number;
  readonly durationMs: number;
}

export interface AuditFailedEventPayload {
  readonly user: string;
  /** Timestamp of the audited query, epoch seconds. */
  readonly timestamp: number;
  readonly errorCode: AuditSinkErrorCode;
  readonly message: string;
  readonly durationMs: number;
}

export interface AuditSinkEventPayloadMap {
  [EVENT_AUDIT_WRITTEN]: AuditWrittenEventPayload;
  [EVENT_AUDIT_FAILED]: AuditFailedEventPayload;
}

export type AuditSinkEventListener<E extends AuditSinkEventName> = (
  payload: AuditSinkEventPayloadMap[E],
) => void;

export interface AuditSinkEventEmitterOptions {
  /**
   * Receives an error thrown by a listener.  Defaults to rethrowing it from
   * a microtask, where it surfaces as an uncaught exception instead of
   * failing the write that emitted the event.
   */
  readonly onListenerError?: (error: unknown) => void;
}

type ListenerRegistry = {
  readonly [E in AuditSinkEventName]: Set<AuditSinkEventListener<E>>;
};

function rethrowLater(error: unknown): void {
  queueMicrotask(() => {
    throw error;
  });
}

/**
 * Fans out `audit:written` and `audit:failed` to registered listeners.
 *
 * Listeners run synchronously in registration order.  A listener that throws
 * never reaches the emitter's caller and never stops the listeners after it.
 */
export class AuditSinkEventEmitter {
  readonly #listeners: ListenerRegistry = {
    [EVENT_AUDIT_WRITTEN]: new Set(),
    [EVENT_AUDIT_FAILED]: new Set(),
  };
  readonly #onListenerError: (error: unknown) => void;

  constructor(options: AuditSinkEventEmitterOptions = {}) {
    this.#onListenerError = options.onListenerError ?? rethrowLater;
  }

  /** Registering the same listener twice keeps one registration. */
  on<E extends AuditSinkEventName>(event: E, listener: AuditSinkEventListener<E>): this {
    this.#listeners[event].add(listener);
    return this;
  }

  off<E extends AuditSinkEventName>(event: E, listener: AuditSinkEventListener<E>): this {
    this.#listeners[event].delete(listener);
    return this;
  }

  emit<E extends AuditSinkEventName>(event: E, payload: AuditSinkEventPayloadMap[E]): void {
    // Snapshot: listeners added or removed by a listener apply from the next emit.
    const listeners: Array<AuditSinkEventListener<E>> = [...this.#listeners[event]];
    for (const listener of listeners) {
      try {
        listener(payload);
      } catch (error: unknown) {
        this.#onListenerError(error);
      }
    }
  }
}
