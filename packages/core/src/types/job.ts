/**
 * Job Types
 *
 * Value types shared between the queue, the event bus and front ends.
 */

import type { JobState } from '../stateMachine.js';

/**
 * Accumulated progress of a running conversion
 */
export interface JobProgress {
  positionMs: number;
  durationMs: number | null;
  percent: number | null;        // 0-100
  speed: number | null;          // x realtime, last reported
  averageSpeed: number | null;   // mean of every reported speed
  bitrateKbps: number | null;
  frame: number | null;
  etaMs: number | null;
}

export type JobOutcome =
  | { status: 'succeeded' }
  | {
      status: 'failed';
      code: string;
      reason: string;
      exitCode: number | null;
      diagnostics: readonly string[];
    }
  | { status: 'canceled'; reason: string };

export interface JobOptions {
  overwrite?: boolean;
  includeSubtitles?: boolean;
  deleteSourceOnSuccess?: boolean;
  keepPartialOutput?: boolean;
  durationMs?: number;
}

export interface JobTimestamps {
  enqueuedAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
}

export interface JobSummary {
  counts: Record<JobState, number>;
  percent: number | null;
}

export function emptyProgress(durationMs: number | null = null): JobProgress {
  return {
    positionMs: 0,
    durationMs,
    percent: durationMs !== null ? 0 : null,
    speed: null,
    averageSpeed: null,
    bitrateKbps: null,
    frame: null,
    etaMs: null,
  };
}
