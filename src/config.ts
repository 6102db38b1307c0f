import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_URL: optionalString,
  REDIS_HOST: optionalString,
  REDIS_PORT: z.coerce.number().int().default(6379),
  REDIS_PASSWORD: optionalString,
  JWT_SECRET: z.string().min(1).default('change-this-secret-in-production'),
  JWT_EXPIRES_IN: z.string().regex(/^\d+[smhd]$/).default('15m'),
  REFRESH_EXPIRES_IN: z.string().regex(/^\d+[smhd]$/).default('7d'),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  ADMIN_EMAIL: optionalString,
  ADMIN_PASSWORD: optionalString,
  GENERATOR_URL: optionalString,
  GENERATOR_API_KEY: optionalString,
  GALLERY_PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(12),
  GENERATION_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(3),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Parses environment variables; throws listing every invalid entry
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment variables:\n${issues}`);
  }

  return parsed.data;
}
