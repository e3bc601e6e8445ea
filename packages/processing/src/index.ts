/**
 * @encodeq/processing
 *
 * Conversion job orchestration: profiles, the supervised encoder process,
 * output parsing, the job queue and its event bus.
 */

// Command Builder
export {
  FFmpegCommandBuilder,
  type VideoCodecOptions,
  type AudioCodecOptions,
  type SubtitleOptions,
} from './commandBuilder.js';

// Profiles
export {
  AUDIO_ONLY_CONTAINERS,
  ConversionProfile,
  applyProfile,
  profileDefinitionSchema,
  renderProfileArguments,
  type ArgumentList,
  type ProfileDefinition,
  type ProfileOverrides,
  type ProfileQuality,
} from './profile.js';

export {
  ProfileCatalog,
  buildConversionCommand,
  loadBuiltinPresets,
  type ConversionCommandOptions,
  type ProfileInput,
} from './profileCatalog.js';

export { buildDestinationPath, type DestinationOptions } from './destination.js';

// Process Supervisor
export {
  ProcessHandle,
  ProcessSupervisor,
  type ExitOutcome,
  type ProcessSupervisorOptions,
  type SpawnFunction,
  type SpawnRequest,
  type StartOptions,
  type SupervisedChild,
} from './processSupervisor.js';

// Output Parser
export {
  OutputParser,
  ffmpegStderrRecognizer,
  type LineMatch,
  type LineRecognizer,
  type OutputParserOptions,
  type OutputStream,
  type ProgressEvent,
  type StatusEvent,
} from './outputParser.js';

// Event Bus
export {
  EventBus,
  type EventBusOptions,
  type JobEvent,
  type JobEventDraft,
  type JobEventHandler,
  type JobEventKind,
  type JobEventPayloads,
  type SubscribeOptions,
  type Subscription,
} from './eventBus.js';

// Job Queue
export { JobQueue, type JobQueueOptions, type JobSnapshot } from './jobQueue.js';

// Media Prober
export { MediaProber, type MediaProberOptions, type ProbeResult, type ProbedStream } from './prober.js';
