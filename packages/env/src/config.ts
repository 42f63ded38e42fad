import { LOG_LEVELS } from '@ydel/logger';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

const booleanString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((val) => val === 'true');

const envSchema = z.object({
  YDEL_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  YDEL_LOG_COLOR: booleanString,
  YDEL_LOG_FILE: z.string().trim().min(1, { message: 'Log file path must not be empty' }).optional(),
  YDEL_GUIDELINE: z.string().trim().min(1, { message: 'Guideline id must not be empty' }).default('eaa-emqn-2023'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type EnvConfig = z.infer<typeof envSchema>;

let validatedEnv: EnvConfig | undefined;

/**
 * Validate an environment object. Every failing variable is listed in the
 * error message, one per line.
 */
export function parseEnv(env: NodeJS.ProcessEnv): Result<EnvConfig, Error> {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    return err(new Error(`Environment validation failed:\n${errors}`));
  }
  return ok(result.data);
}

/**
 * Validates process.env on first access and caches the result.
 */
export function loadEnv(): Result<EnvConfig, Error> {
  if (validatedEnv) {
    return ok(validatedEnv);
  }
  return parseEnv(process.env).map((config) => {
    validatedEnv = config;
    return config;
  });
}

/** Forget the cached environment so the next loadEnv() re-reads process.env. */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}
