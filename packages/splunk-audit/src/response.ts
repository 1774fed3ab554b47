// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { CollectorRejectionError, ResponseDecodeError } from './errors.js';
import type { CollectorAck } from './types.js';

/**
 * Zod schema for the collector acknowledgment.
 *
 * Keys are matched case-insensitively, so `{"text":"Success","code":0}` and
 * `{"Code":0,"Text":""}` decode alike.  Absent fields take their zero value.
 */
export const CollectorAckSchema = z.preprocess(
  lowerCaseKeys,
  z.object({
    code: z.number().int().default(0),
    text: z.string().default(''),
  }),
);

/**
 * Decode an acknowledgment body.
 *
 * @throws {ResponseDecodeError} when the body is not a JSON object of the
 *   expected shape.
 */
export function decodeAck(body: string): CollectorAck {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error: unknown) {
    throw new ResponseDecodeError(error);
  }

  const result = CollectorAckSchema.safeParse(parsed);
  if (!result.success) {
    const messages = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
    );
    throw new ResponseDecodeError(new TypeError(messages.join('; ')));
  }
  return result.data;
}

/**
 * Turn an acknowledgment body into success or a typed failure.
 *
 * @throws {ResponseDecodeError} when the body cannot be decoded.
 * @throws {CollectorRejectionError} when the collector returned a non-zero code.
 */
export function interpretAck(body: string): void {
  const ack = decodeAck(body);
  if (ack.code !== 0) {
    throw new CollectorRejectionError(ack.code, ack.text);
  }
}

function lowerCaseKeys(value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  // An exact lower-case key wins over a differently cased duplicate.
  const normalised = new Map<string, unknown>();
  for (const [key, field] of Object.entries(value)) {
    const lower = key.toLowerCase();
    if (!normalised.has(lower) || key === lower) {
      normalised.set(lower, field);
    }
  }
  return Object.fromEntries(normalised);
}
