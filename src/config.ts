import dotenv from 'dotenv';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  SOURCES_FILE: z.string().min(1).default('sources.json'),
  RPC_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(10000),
  // Unset: locations stay cached until evicted
  LOCATION_CACHE_TTL_SECONDS: z.coerce.number().int().positive().optional(),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Validate configuration from the environment (.env is loaded first)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) {
    dotenv.config();
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  return parsed.data;
}
