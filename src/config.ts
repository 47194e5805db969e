import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { logger } from './utils/logger.js';

// Load environment variables from .env.local for development
dotenvConfig({ path: '.env.local' });
dotenvConfig(); // Fallback to .env

/**
 * Body size limits in the notation accepted by express.json (e.g. "100kb", "1mb")
 */
const bodyLimitSchema = z
  .string()
  .regex(/^\d+(b|kb|mb)$/i, 'Body limit must look like 100kb or 1mb');

/**
 * Configuration schema with Zod validation
 */
const configSchema = z.object({
  service: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
  }),

  api: z.object({
    // 0 binds an ephemeral port
    port: z.coerce.number().int().min(0).max(65535),
    host: z.string().min(1),
    bodyLimit: bodyLimitSchema,
    // Forced close after this many milliseconds on shutdown
    shutdownTimeoutMs: z.coerce.number().int().min(0).max(60000),
  }),

  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
  }),
});

export type Config = z.infer<typeof configSchema>;

export type Environment = Record<string, string | undefined>;

/**
 * Parse and validate configuration from environment variables
 *
 * Throws the ZodError when a variable is present but invalid.
 */
export function parseConfig(env: Environment = process.env): Config {
  const rawConfig = {
    service: {
      name: env.SERVICE_NAME ?? 'user-registry',
      version: env.SERVICE_VERSION ?? '1.0.0',
    },
    api: {
      port: env.API_PORT ?? '8000',
      host: env.API_HOST ?? '0.0.0.0',
      bodyLimit: env.API_BODY_LIMIT ?? '1mb',
      shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS ?? '10000',
    },
    logging: {
      level: env.LOG_LEVEL ?? 'info',
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    logger.fatal({ errors }, 'Invalid configuration');
    throw result.error;
  }

  return result.data;
}
