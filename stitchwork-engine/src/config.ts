import dotenv from 'dotenv';
import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';
import { ERROR_POLICIES } from './types/graph.js';

dotenv.config();

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  STITCHWORK_MAX_CONCURRENCY: positiveInt(4),
  STITCHWORK_NODE_TIMEOUT_MS: positiveInt(300000),
  STITCHWORK_NODE_RETRIES: nonNegativeInt(0),
  STITCHWORK_ERROR_POLICY: z.enum(ERROR_POLICIES).default('stop_graph'),
  STITCHWORK_WORKSPACE_TTL_MS: positiveInt(3600000),
  STITCHWORK_REAPER_INTERVAL_MS: positiveInt(60000),
  STITCHWORK_EVENT_QUEUE_LIMIT: positiveInt(1000),
  STITCHWORK_CHECKPOINT_DIR: z.string().min(1).default('.stitchwork/checkpoints'),
  STITCHWORK_CHECKPOINT_EVERY: nonNegativeInt(1),
  STITCHWORK_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  STITCHWORK_SERVICE_ID: z.string().min(1).default('stitchwork-engine'),
});

export type EngineConfig = ReturnType<typeof loadConfig>;

/**
 * Read engine settings from the environment. Unset or empty variables fall
 * back to defaults; malformed values throw with the offending variable named.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const raw = Object.fromEntries(
    Object.keys(envSchema.shape).map((key) => [key, env[key] === '' ? undefined : env[key]])
  );
  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid engine configuration: ${problems.join('; ')}`);
  }
  const values = parsed.data;

  return {
    serviceId: values.STITCHWORK_SERVICE_ID,
    logLevel: values.STITCHWORK_LOG_LEVEL,

    executor: {
      // Maximum nodes running at once
      maxConcurrency: values.STITCHWORK_MAX_CONCURRENCY,
      // Per-node deadline (ms)
      nodeTimeoutMs: values.STITCHWORK_NODE_TIMEOUT_MS,
      // Extra attempts for retryable node errors
      nodeRetries: values.STITCHWORK_NODE_RETRIES,
      errorPolicy: values.STITCHWORK_ERROR_POLICY,
    },

    workspace: {
      ttlMs: values.STITCHWORK_WORKSPACE_TTL_MS,
      reaperIntervalMs: values.STITCHWORK_REAPER_INTERVAL_MS,
    },

    events: {
      // Per-subscriber queue bound before the subscriber is disconnected
      queueLimit: values.STITCHWORK_EVENT_QUEUE_LIMIT,
    },

    checkpoint: {
      dir: values.STITCHWORK_CHECKPOINT_DIR,
      // Checkpoint after every N committed nodes; 0 disables
      every: values.STITCHWORK_CHECKPOINT_EVERY,
    },
  };
}

export const config = loadConfig();
