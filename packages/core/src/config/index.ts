/**
 * Bridge Configuration
 *
 * Defaults, environment loading and validation for every bridge component.
 * All durations are milliseconds; the refill rate is tokens per second.
 */

import { z } from 'zod';
import { InvalidConfigurationError } from '../errors';
import { MAX_CALL_TIMEOUT_MS } from '../resilience/circuit-breaker';

// ============================================================
// SCHEMA
// ============================================================

const nonNegativeInt = z.coerce.number().int().nonnegative();

export const BridgeConfigSchema = z.object({
  admission: z
    .object({
      capacity: z.coerce.number().nonnegative().default(1000),
      refillRate: z.coerce.number().nonnegative().default(100),
    })
    .default({}),
  breaker: z
    .object({
      failureThreshold: z.coerce.number().int().positive().default(5),
      resetTimeoutMs: nonNegativeInt.default(60_000),
      callTimeoutMs: z.coerce.number().int().positive().max(MAX_CALL_TIMEOUT_MS).default(30_000),
    })
    .default({}),
  cache: z
    .object({
      ttlMs: nonNegativeInt.default(300_000),
      /** 0 means unbounded */
      maxEntries: nonNegativeInt.default(10_000),
      scope: z.enum(['global', 'requester']).default('global'),
    })
    .default({}),
  telemetry: z
    .object({
      flushSize: z.coerce.number().int().positive().default(10),
    })
    .default({}),
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
export type BridgeConfigInput = z.input<typeof BridgeConfigSchema>;
export type CacheScope = BridgeConfig['cache']['scope'];

// ============================================================
// LOADING
// ============================================================

const ENV_KEYS = {
  admission: {
    capacity: 'BRIDGE_ADMISSION_CAPACITY',
    refillRate: 'BRIDGE_ADMISSION_REFILL_RATE',
  },
  breaker: {
    failureThreshold: 'BRIDGE_BREAKER_FAILURE_THRESHOLD',
    resetTimeoutMs: 'BRIDGE_BREAKER_RESET_TIMEOUT_MS',
    callTimeoutMs: 'BRIDGE_BREAKER_CALL_TIMEOUT_MS',
  },
  cache: {
    ttlMs: 'BRIDGE_CACHE_TTL_MS',
    maxEntries: 'BRIDGE_CACHE_MAX_ENTRIES',
    scope: 'BRIDGE_CACHE_SCOPE',
  },
  telemetry: {
    flushSize: 'BRIDGE_TELEMETRY_FLUSH_SIZE',
  },
} as const;

/**
 * Validate a partial configuration and fill in defaults
 */
export function resolveConfig(input: BridgeConfigInput = {}): BridgeConfig {
  return parseConfig(input);
}

function parseConfig(input: unknown): BridgeConfig {
  const parsed = BridgeConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      'Invalid bridge configuration',
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Build configuration from environment variables. Unset or empty
 * variables fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const input: Record<string, Record<string, string>> = {};

  for (const [section, keys] of Object.entries(ENV_KEYS)) {
    const values: Record<string, string> = {};
    for (const [field, envKey] of Object.entries(keys)) {
      const raw = env[envKey];
      if (raw !== undefined && raw.trim() !== '') {
        values[field] = raw.trim();
      }
    }
    input[section] = values;
  }

  return parseConfig(input);
}
