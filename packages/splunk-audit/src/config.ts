// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { InvalidConfigError } from './errors.js';
import type { SinkConfig } from './types.js';

/**
 * Zod schema for SinkConfig.
 *
 * Every field may be empty: an empty endpoint or token is a valid input that
 * fails (or goes unauthenticated) at write time, not at load time.
 */
export const SinkConfigSchema = z.object({
  endpoint: z.string().default(''),
  token: z.string().default(''),
  host: z.string().default(''),
  namespace: z.string().default(''),
  pod: z.string().default(''),
  index: z.string().default(''),
});

/** Environment variable read for each SinkConfig field. */
export const SINK_ENV_VARS = {
  endpoint: 'SPLUNK_ENDPOINT',
  token: 'SPLUNK_TOKEN',
  index: 'SPLUNK_INDEX',
  host: 'HOST',
  namespace: 'NAMESPACE',
  pod: 'POD_NAME',
} as const satisfies Record<keyof SinkConfig, string>;

/**
 * Parse and validate a raw config object, throwing InvalidConfigError on
 * failure.  Missing fields default to the empty string.
 */
export function parseSinkConfig(raw: unknown): SinkConfig {
  const result = SinkConfigSchema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new InvalidConfigError(messages);
  }
  return result.data;
}

/**
 * Build a SinkConfig from environment variables (see {@link SINK_ENV_VARS}).
 */
export function loadSinkConfigFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): SinkConfig {
  return parseSinkConfig({
    endpoint: env[SINK_ENV_VARS.endpoint],
    token: env[SINK_ENV_VARS.token],
    index: env[SINK_ENV_VARS.index],
    host: env[SINK_ENV_VARS.host],
    namespace: env[SINK_ENV_VARS.namespace],
    pod: env[SINK_ENV_VARS.pod],
  });
}
