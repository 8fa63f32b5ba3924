import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

export const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  DB_TYPE: z.enum(['better-sqlite3', 'postgres']).default('better-sqlite3'),
  DATABASE_PATH: z.string().default('crm.db'),
  DATABASE_URL: optionalString,

  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),

  // Seeds for the settings row
  API_TOKEN: optionalString,
  AGENT_API_URL: optionalString,
  AGENT_API_KEY: optionalString,
  BASE_URL: optionalString,

  AGENT_PROVIDER: z.enum(['http', 'mock']).default('http'),
  AGENT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  ENRICHMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
});

export type EnvironmentVariables = z.infer<typeof EnvSchema>;

export function validateEnv(config: Record<string, unknown>): EnvironmentVariables {
  const parsed = EnvSchema.safeParse(config);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  if (parsed.data.DB_TYPE === 'postgres' && !parsed.data.DATABASE_URL) {
    throw new Error(
      'Invalid environment configuration: DATABASE_URL is required when DB_TYPE=postgres',
    );
  }

  return parsed.data;
}
