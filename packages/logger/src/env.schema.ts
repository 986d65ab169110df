import { z } from 'zod';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const loggerEnvSchema = z.object({
  LOGGER_FILE_LOG_ENABLED: z
    .string()
    .default('false')
    .transform((val: string) => val === 'true'),
  LOGGER_FILE_LOG_PATH: z.string().trim().min(1, { message: 'Invalid file log path' }).default('logs/tallyledger.log'),
  LOGGER_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOGGER_SERVICE_NAME: z.string().default('tallyledger'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Validate logger environment variables.
 * @throws Error listing every invalid variable
 */
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Logger environment validation failed:\n${errors}`);
  }
  return result.data;
}
