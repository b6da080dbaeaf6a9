/**
 * API configuration, read once from the environment at start-up.
 */

import { z } from 'zod';

const booleanString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const commaList = z
  .string()
  .transform((v) => [...new Set(v.split(',').map((s) => s.trim()).filter((s) => s.length > 0))]);

export const ConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  JWT_SECRET: z.string().min(1).default('dev-secret-change-in-production'),

  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().default(5432),
  DB_NAME: z.string().default('loandesk'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_SSL: booleanString,

  DEFAULT_DEPARTMENTS: commaList.default('IT,HR,Finance'),
  DEFAULT_POSITIONS_PER_DEPARTMENT: z.coerce.number().int().min(0).max(500).default(3),
}).refine(
  (c) => c.NODE_ENV !== 'production' || c.JWT_SECRET !== 'dev-secret-change-in-production',
  { message: 'JWT_SECRET must be set in production', path: ['JWT_SECRET'] },
);

export type AppConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }
  return result.data;
}

let cached: AppConfig | null = null;

/** Process-wide configuration, parsed on first use. */
export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
