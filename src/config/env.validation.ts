import { z } from 'zod';

const booleanString = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

export const EnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3000),

  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USERNAME: z.string().default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_DATABASE: z.string().default('cryostat_logger'),

  INSTRUMENT_GATEWAY_URL: z.string().url().default('http://localhost:7682'),
  INSTRUMENT_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(10000),

  SETUPS_CONFIG_PATH: z.string().min(1).default('config/setups.json'),
  /** Start logging every discovered setup at boot */
  LOGGING_AUTOSTART: booleanString.default('true'),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * `validate` hook for ConfigModule.forRoot. Fails the boot with every
 * offending variable listed.
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${problems}`);
  }
  return result.data;
}
