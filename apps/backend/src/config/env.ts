import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z
  .union([
    z.boolean(),
    z
      .string()
      .transform(value => value.trim().toLowerCase())
      .transform(value => ['1', 'true', 'yes', 'on'].includes(value))
  ])
  .default(true);

export const envSchema = z.object({
  // NODE_ENV is set by the process manager or test runner (don't set in .env)
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  MONGODB_URI: z.string().min(1, 'MONGODB_URI is required'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  ENABLE_SCHEDULER: booleanFlag,
  // node-cron expression; six fields means the first one is seconds
  NORMALIZE_CRON: z.string().min(1).default('*/10 * * * * *'),
  NORMALIZE_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  NORMALIZE_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5)
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
  throw new Error('Failed to parse environment variables');
}

export type EnvConfig = z.infer<typeof envSchema>;

export const env: EnvConfig = parsed.data;
