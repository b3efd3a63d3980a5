import { env } from './env.js';

const toNumber = (value: string | undefined, fallback: number) => {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

/**
 * Settings for the `actions:normalize` job.
 *
 * The write retry knobs are tuning values rather than deployment settings, so
 * they are read loosely and fall back to defaults instead of failing startup.
 */
export const normalizerConfig = {
  jobName: 'actions:normalize',
  schedule: env.NORMALIZE_CRON,
  enabled: env.ENABLE_SCHEDULER,
  batchSize: env.NORMALIZE_BATCH_SIZE,
  maxAttempts: env.NORMALIZE_MAX_ATTEMPTS,
  writeRetry: {
    retries: toNumber(process.env.ACTION_WRITE_RETRIES, 3),
    delayMs: toNumber(process.env.ACTION_WRITE_RETRY_DELAY_MS, 500),
    factor: 2
  }
};

export type NormalizerConfig = typeof normalizerConfig;
