/**
 * Wires the conversion core from the environment configuration
 */

import { loadConfig, type EncodeqConfig } from '@encodeq/core';
import {
  EventBus,
  JobQueue,
  MediaProber,
  ProcessSupervisor,
  ProfileCatalog,
} from '@encodeq/processing';
import { createLogger, setLogLevel } from '@encodeq/utils';

export interface RuntimeOptions {
  debug?: boolean;
  maxConcurrentJobs?: number;
  outputSilenceTimeoutMs?: number;
}

export interface Runtime {
  config: EncodeqConfig;
  catalog: ProfileCatalog;
  queue: JobQueue;
  prober: MediaProber;
}

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const config = loadConfig();

  // Log lines would tear through the spinners unless asked for
  setLogLevel(options.debug ? 'debug' : process.env['LOG_LEVEL'] ? config.logLevel : 'warn');
  const log = createLogger({ module: 'cli' });

  const supervisor = new ProcessSupervisor({
    outputSilenceTimeoutMs: options.outputSilenceTimeoutMs ?? config.supervisor.outputSilenceTimeoutMs,
    terminationGracePeriodMs: config.supervisor.terminationGracePeriodMs,
    maxTerminationAttempts: config.supervisor.maxTerminationAttempts,
    logger: log,
  });
  const catalog = ProfileCatalog.withBuiltins();

  const queue = new JobQueue({
    catalog,
    supervisor,
    bus: new EventBus({ replayBufferSize: config.events.replayBufferSize, logger: log }),
    encoderPath: config.binaries.ffmpeg.resolvedPath,
    maxConcurrentJobs: options.maxConcurrentJobs ?? config.queue.maxConcurrentJobs,
    diagnosticTailLines: config.parser.diagnosticTailLines,
    logger: log,
  });

  const prober = new MediaProber({
    ffprobePath: config.binaries.ffprobe.resolvedPath,
    supervisor,
    logger: log,
  });

  log.debug({ binaries: config.binaries }, 'Runtime ready');
  return { config, catalog, queue, prober };
}
