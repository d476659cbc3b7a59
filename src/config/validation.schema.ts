import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Job
  INPUT_FILE: z.string().trim().min(1),
  TARGET_LANGUAGE: z.string().trim().min(1).default('zh-CN'),
  TRANSLATE_STYLE: z.string().trim().min(1).default('auto'),

  // Services
  API_HOST: z.string().trim().min(1).default('127.0.0.1'),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(8001),
  SERVICE_EXECUTABLE: z.string().trim().min(1).default('python3'),
  SERVICE_WORKDIR: z.string().trim().min(1).optional(),
  LOG_DIR: z.string().trim().min(1).default('logs'),
  FILE_WORKER_COUNT: positiveInt.max(64).default(1),

  // Health gate
  HEALTH_MAX_ATTEMPTS: positiveInt.default(30),
  HEALTH_INTERVAL_MS: nonNegativeInt.default(1000),
  HEALTH_REQUEST_TIMEOUT_MS: positiveInt.default(2000),
  HEALTH_READY_VALUE: z.string().min(1).default('ok'),

  // Submission, polling, result
  SUBMIT_REQUEST_TIMEOUT_MS: positiveInt.default(60000),
  POLL_MAX_ITERATIONS: positiveInt.default(360),
  POLL_INTERVAL_MS: nonNegativeInt.default(5000),
  POLL_REQUEST_TIMEOUT_MS: positiveInt.default(10000),
  RESULT_REQUEST_TIMEOUT_MS: positiveInt.default(10000),

  // Teardown
  SHUTDOWN_GRACE_MS: nonNegativeInt.default(8000),
  SHUTDOWN_KILL_TIMEOUT_MS: nonNegativeInt.default(5000),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
