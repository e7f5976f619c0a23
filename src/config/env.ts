/**
 * Process environment, validated once at startup.
 */

import { z } from 'zod';
import { ConfigError } from '../common/errors.js';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PORT: z.coerce.number().int().positive().default(8001),
  HOST: z.string().default('0.0.0.0'),
  MONGO_URL: z.string().default('mongodb://localhost:27017'),
  MONGO_DB: z.string().default('fed_monitor'),
  MONITOR_CONFIG_PATH: z.string().default('config/fed-monitor.config.json'),
  CORS_ORIGINS: z.string().default('*'),
  SCHEDULER_ENABLED: z
    .enum(['0', '1', 'true', 'false'])
    .default('0')
    .transform(v => v === '1' || v === 'true'),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError('Invalid environment', issues);
  }
  return parsed.data;
}
