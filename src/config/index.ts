import { z, ZodError } from 'zod';
import { PickerError } from '../utils/PickerError';

/**
 * Environment schema. CLI options take precedence over these values.
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('warn'),
  PICKER_CONSECUTIVE_RULE: z
    .enum(['previous-characters', 'adjacent-run'])
    .default('previous-characters'),
  PICKER_CHUNK_SIZE: z.coerce.number().int().positive().default(2000),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses and validates environment variables from the given source.
 *
 * @throws PickerError when a variable is present but invalid
 */
export function loadEnv(source: NodeJS.ProcessEnv): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.errors
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw PickerError.config(details);
    }
    throw error;
  }
}

export const env: Env = loadEnv(process.env);
