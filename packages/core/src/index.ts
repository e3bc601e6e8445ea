/**
 * @encodeq/core
 *
 * Core package containing:
 * - Job state machine
 * - Error taxonomy
 * - Shared job types
 * - Configuration and binary resolution
 */

// State machine
export {
  JobState,
  JobStateMachine,
  isValidTransition,
  isTerminalState,
  getNextStates,
} from './stateMachine.js';

export type {
  JobStateTransition,
  TerminalJobState,
} from './stateMachine.js';

// Types
export { emptyProgress } from './types/job.js';
export type {
  JobProgress,
  JobOutcome,
  JobOptions,
  JobTimestamps,
  JobSummary,
} from './types/job.js';

// Errors
export {
  EncodeqError,
  InvalidProfileError,
  UnknownProfileError,
  SpawnError,
  HangTimeoutError,
  TerminationFailedError,
  DuplicateDestinationError,
  EncoderExitError,
  SourceNotFoundError,
  DestinationExistsError,
  JobNotFoundError,
  StateTransitionError,
  ConfigError,
  ProbeError,
  isEncodeqError,
  toErrorMessage,
} from './errors/index.js';

// Configuration
export { loadConfig, type EncodeqConfig } from './config/index.js';
export {
  getBinariesConfig,
  resolveBinaryPath,
  type BinaryConfig,
  type BinariesConfig,
  type BinarySource,
} from './config/binaries.js';
