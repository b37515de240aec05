/**
 * Application configuration
 *
 * Reads settings from environment variables and validates them with zod.
 * Every setting has a default so the service starts with an empty environment.
 */

import { z } from 'zod';
import { LogLevelSchema } from '../logging/logger.js';

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === 'true'));

export const AppConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  SKIP_AUTH: booleanFlag(false),
  ENABLE_SWAGGER: booleanFlag(true),
  LOG_LEVEL: LogLevelSchema.default('info'),
  DISTANCE_API_URL: z
    .string()
    .url()
    .default('https://maps.googleapis.com/maps/api/distancematrix/json'),
  DISTANCE_API_KEY: z.string().default(''),
  DISTANCE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  DISTANCE_CACHE_TTL_HOURS: z.coerce.number().positive().default(24),
  SCORING_CONCURRENCY: z.coerce.number().int().min(1).max(256).default(16),
  RECOMMENDATION_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  /** JSON file with jobs, contractors and assignments loaded into the in-memory repositories */
  SEED_DATA_FILE: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Parses configuration from an environment record
 *
 * @throws ZodError with field-level details when a variable is malformed
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  return AppConfigSchema.parse(env);
}
