/**
 * Application configuration
 *
 * Read from the environment and validated with Zod.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { DEFAULT_JOB_BOUNDS, DEFAULT_TIMEOUTS } from './defaults';

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info');

// kubectl duration, e.g. 20s, 5m, 1h30m
const KubectlDurationSchema = z
  .string()
  .regex(/^(\d+(ms|s|m|h))+$/, 'expected a duration such as 20s or 5m');

const AppConfigSchema = z
  .object({
    logLevel: LogLevelSchema,
    azure: z.object({
      subscriptionId: z.string().min(1).optional(),
      resourceGroup: z.string().min(1).optional(),
    }),
    outputDir: z.string().min(1).default(() => process.cwd()),
    polling: z.object({
      intervalMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.pollInterval),
      maxIntervalMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.maxPollInterval),
    }),
    job: z.object({
      podRunningTimeout: KubectlDurationSchema.default(DEFAULT_JOB_BOUNDS.podRunningTimeout),
      completeTimeout: KubectlDurationSchema.default(DEFAULT_JOB_BOUNDS.completeTimeout),
    }),
  })
  .refine((config) => config.polling.intervalMs <= config.polling.maxIntervalMs, {
    message: 'poll interval must not exceed the maximum poll interval',
    path: ['polling', 'intervalMs'],
  });

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Build configuration from environment variables
 */
export function createConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = AppConfigSchema.safeParse({
    logLevel: env.LOG_LEVEL,
    azure: {
      subscriptionId: env.AZURE_SUBSCRIPTION_ID,
      resourceGroup: env.AZURE_RESOURCE_GROUP,
    },
    outputDir: env.CONVERGE_OUTPUT_DIR,
    polling: {
      intervalMs: env.CONVERGE_POLL_INTERVAL_MS,
      maxIntervalMs: env.CONVERGE_MAX_POLL_INTERVAL_MS,
    },
    job: {
      podRunningTimeout: env.CONVERGE_JOB_POD_TIMEOUT,
      completeTimeout: env.CONVERGE_JOB_COMPLETE_TIMEOUT,
    },
  });

  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`invalid configuration: ${details}`, keys);
  }

  return parsed.data;
}
