/**
 * Runtime Configuration
 *
 * Environment-driven settings for the conversion core, validated with zod.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import { getBinariesConfig, type BinariesConfig } from './binaries.js';

const intFromEnv = (min: number, fallback: number) =>
  z.coerce.number().int().min(min).default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Queue
  MAX_CONCURRENT_JOBS: intFromEnv(1, 1),

  // Process supervision
  OUTPUT_SILENCE_TIMEOUT_MS: intFromEnv(1, 60_000),
  TERMINATION_GRACE_PERIOD_MS: intFromEnv(1, 3_000),
  MAX_TERMINATION_ATTEMPTS: intFromEnv(2, 3),

  // Output parsing / events
  DIAGNOSTIC_TAIL_LINES: intFromEnv(1, 20),
  EVENT_REPLAY_BUFFER: intFromEnv(0, 50),

  // Media tools
  FFMPEG_PATH: z.string().min(1).optional(),
  FFPROBE_PATH: z.string().min(1).optional(),
});

export interface EncodeqConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  queue: {
    maxConcurrentJobs: number;
  };
  supervisor: {
    outputSilenceTimeoutMs: number;
    terminationGracePeriodMs: number;
    maxTerminationAttempts: number;
  };
  parser: {
    diagnosticTailLines: number;
  };
  events: {
    replayBufferSize: number;
  };
  binaries: BinariesConfig;
}

let dotenvLoaded = false;

/**
 * Load and validate configuration.
 * `.env` is read once and never overrides variables already set.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): EncodeqConfig {
  if (!dotenvLoaded && env === process.env) {
    dotenvConfig();
    dotenvLoaded = true;
  }

  // Blank values count as unset
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;

  return {
    nodeEnv: values.NODE_ENV,
    logLevel: values.LOG_LEVEL,
    queue: {
      maxConcurrentJobs: values.MAX_CONCURRENT_JOBS,
    },
    supervisor: {
      outputSilenceTimeoutMs: values.OUTPUT_SILENCE_TIMEOUT_MS,
      terminationGracePeriodMs: values.TERMINATION_GRACE_PERIOD_MS,
      maxTerminationAttempts: values.MAX_TERMINATION_ATTEMPTS,
    },
    parser: {
      diagnosticTailLines: values.DIAGNOSTIC_TAIL_LINES,
    },
    events: {
      replayBufferSize: values.EVENT_REPLAY_BUFFER,
    },
    binaries: getBinariesConfig({
      ffmpeg: values.FFMPEG_PATH,
      ffprobe: values.FFPROBE_PATH,
    }),
  };
}
