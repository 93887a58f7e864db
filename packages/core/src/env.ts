import { z } from 'zod';

/**
 * Environment Variable Validation
 */

const RuntimeEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

const DataEnvSchema = z.object({
  /** Directory that relative CSV file names are resolved against */
  INFLAMMATION_DATA_DIR: z.string().min(1, 'Data directory must not be empty').optional(),
});

export const StudyEnvSchema = RuntimeEnvSchema.merge(DataEnvSchema);

export type StudyEnv = z.infer<typeof StudyEnvSchema>;

/**
 * Validate environment variables
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): StudyEnv {
  const result = StudyEnvSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const errorMessages = Object.entries(errors)
      .map(([field, messages]) => `  ${field}: ${(messages ?? []).join(', ')}`)
      .join('\n');

    throw new Error(`Environment validation failed:\n${errorMessages}`);
  }

  return result.data;
}

/**
 * Get validated env with type safety
 */
export function getEnv(): StudyEnv {
  return validateEnv(process.env);
}
