/**
 * Custom Error Classes
 */

import type { JobState } from '../stateMachine.js';

/**
 * Base error class for all encodeq errors
 */
export class EncodeqError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EncodeqError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A conversion profile failed validation
 */
export class InvalidProfileError extends EncodeqError {
  public readonly issues: readonly string[];

  constructor(profileId: string, issues: readonly string[]) {
    super(
      `Invalid profile ${profileId || '(unnamed)'}: ${issues.join('; ')}`,
      'INVALID_PROFILE',
      { profileId, issues }
    );
    this.name = 'InvalidProfileError';
    this.issues = issues;
  }
}

export class UnknownProfileError extends EncodeqError {
  constructor(profileId: string) {
    super(`Unknown profile: ${profileId}`, 'UNKNOWN_PROFILE', { profileId });
    this.name = 'UnknownProfileError';
  }
}

/**
 * The executable could not be started (missing, not executable, ...)
 */
export class SpawnError extends EncodeqError {
  constructor(executable: string, cause: string, osCode?: string) {
    super(
      `Failed to start ${executable}: ${cause}`,
      'SPAWN_FAILED',
      { executable, osCode }
    );
    this.name = 'SpawnError';
  }
}

/**
 * No output was observed within the silence window
 */
export class HangTimeoutError extends EncodeqError {
  constructor(executable: string, silenceMs: number, pid?: number) {
    super(
      `${executable} produced no output for ${silenceMs}ms and was terminated`,
      'HANG_TIMEOUT',
      { executable, silenceMs, pid }
    );
    this.name = 'HangTimeoutError';
  }
}

/**
 * The process survived every termination attempt
 */
export class TerminationFailedError extends EncodeqError {
  constructor(executable: string, attempts: number, pid?: number) {
    super(
      `${executable} (pid ${pid ?? 'unknown'}) did not exit after ${attempts} termination attempts`,
      'TERMINATION_FAILED',
      { executable, attempts, pid }
    );
    this.name = 'TerminationFailedError';
  }
}

export class DuplicateDestinationError extends EncodeqError {
  constructor(destination: string, existingJobId: string) {
    super(
      `Destination ${destination} is already targeted by job ${existingJobId}`,
      'DUPLICATE_DESTINATION',
      { destination, existingJobId }
    );
    this.name = 'DuplicateDestinationError';
  }
}

/**
 * Encoder exited with a non-zero code or was killed by a signal
 */
export class EncoderExitError extends EncodeqError {
  public readonly exitCode: number | null;
  public readonly diagnostics: readonly string[];

  constructor(
    exitCode: number | null,
    signal: string | null,
    diagnostics: readonly string[]
  ) {
    const how = exitCode !== null ? `exit code ${exitCode}` : `signal ${signal ?? 'unknown'}`;
    super(
      `Encoder failed with ${how}`,
      'ENCODER_FAILED',
      { exitCode, signal, diagnostics: [...diagnostics] }
    );
    this.name = 'EncoderExitError';
    this.exitCode = exitCode;
    this.diagnostics = diagnostics;
  }
}

export class SourceNotFoundError extends EncodeqError {
  constructor(source: string) {
    super(`Source file not found or not readable: ${source}`, 'SOURCE_NOT_FOUND', { source });
    this.name = 'SourceNotFoundError';
  }
}

export class DestinationExistsError extends EncodeqError {
  constructor(destination: string) {
    super(`Destination already exists: ${destination}`, 'DESTINATION_EXISTS', { destination });
    this.name = 'DestinationExistsError';
  }
}

export class JobNotFoundError extends EncodeqError {
  constructor(jobId: string) {
    super(`Job not found: ${jobId}`, 'JOB_NOT_FOUND', { jobId });
    this.name = 'JobNotFoundError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends EncodeqError {
  constructor(
    jobId: string,
    fromState: JobState,
    toState: JobState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { jobId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

export class ConfigError extends EncodeqError {
  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_INVALID', { issues });
    this.name = 'ConfigError';
  }
}

export class ProbeError extends EncodeqError {
  constructor(file: string, reason: string) {
    super(`Failed to probe ${file}: ${reason}`, 'PROBE_FAILED', { file, reason });
    this.name = 'ProbeError';
  }
}

export function isEncodeqError(error: unknown): error is EncodeqError {
  return error instanceof EncodeqError;
}

/**
 * Human-readable message for any thrown value
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
