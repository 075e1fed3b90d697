/**
 * Branchwise Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults. Per-search settings are not read here;
 * they arrive with each submission.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Retry configuration for collaborator calls
 */
const retryConfigSchema = z.object({
  /** Delay before the first retry */
  initialIntervalMs: z.coerce.number().int().min(0).max(600000).default(2000),
  /** Multiplier applied per attempt */
  backoffCoefficient: z.coerce.number().min(1).max(10).default(2),
  /** Cap on any single delay */
  maxIntervalMs: z.coerce.number().int().min(0).max(3600000).default(30000),
  /** Total attempts including the first one */
  maxAttempts: z.coerce.number().int().min(1).max(20).default(4),
});

export type RetryConfig = z.infer<typeof retryConfigSchema>;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Model used by the default generator and evaluator
  model: z.string().min(1).default('gpt-4o-mini'),

  // Maximum wait for a single collaborator attempt
  callTimeoutMs: z.coerce.number().int().min(1000).max(3600000).default(120000),

  retry: retryConfigSchema,

  // Server
  port: z.coerce.number().int().min(1).max(65535).default(3001),
  host: z.string().default('0.0.0.0'),
  apiKey: z.string().min(1).optional(),
});

export type BranchwiseConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(): BranchwiseConfig {
  const raw = {
    model: process.env.BRANCHWISE_MODEL ?? process.env.OPENAI_MODEL,
    callTimeoutMs: process.env.BRANCHWISE_CALL_TIMEOUT_MS,
    retry: {
      initialIntervalMs: process.env.BRANCHWISE_RETRY_INITIAL_MS,
      backoffCoefficient: process.env.BRANCHWISE_RETRY_BACKOFF,
      maxIntervalMs: process.env.BRANCHWISE_RETRY_MAX_INTERVAL_MS,
      maxAttempts: process.env.BRANCHWISE_RETRY_MAX_ATTEMPTS,
    },
    port: process.env.BRANCHWISE_PORT,
    host: process.env.BRANCHWISE_HOST,
    apiKey: process.env.BRANCHWISE_API_KEY || undefined,
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.info(
    {
      model: result.data.model,
      callTimeoutMs: result.data.callTimeoutMs,
      retryMaxAttempts: result.data.retry.maxAttempts,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: BranchwiseConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): BranchwiseConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
