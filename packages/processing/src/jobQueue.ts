/**
 * Job Queue / Scheduler
 *
 * Owns every Job record. All state changes happen in the synchronous
 * methods of this class, so concurrent completions, enqueues and cancels
 * are serialized by the event loop; process I/O runs in each job's own
 * async execution and never holds up the queue.
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import { dirname } from 'node:path';
import {
  ConfigError,
  DestinationExistsError,
  DuplicateDestinationError,
  EncoderExitError,
  JobNotFoundError,
  JobState,
  JobStateMachine,
  SourceNotFoundError,
  emptyProgress,
  isEncodeqError,
  isTerminalState,
  toErrorMessage,
  type JobOptions,
  type JobOutcome,
  type JobProgress,
  type JobStateTransition,
  type JobSummary,
  type JobTimestamps,
} from '@encodeq/core';
import {
  createLogger,
  ensureDir,
  isReadableFile,
  normalizePath,
  pathExists,
  removeFile,
  type Logger,
} from '@encodeq/utils';
import { EventBus } from './eventBus.js';
import { OutputParser, type LineRecognizer, type ProgressEvent } from './outputParser.js';
import type { ConversionProfile } from './profile.js';
import { ProfileCatalog, buildConversionCommand, type ProfileInput } from './profileCatalog.js';
import { ProcessSupervisor, type ProcessHandle } from './processSupervisor.js';

export interface JobQueueOptions {
  catalog?: ProfileCatalog;
  supervisor?: ProcessSupervisor;
  bus?: EventBus;
  encoderPath?: string;
  maxConcurrentJobs?: number;
  diagnosticTailLines?: number;
  recognizer?: LineRecognizer;
  workingDir?: string;
  logger?: Logger;
}

export interface JobSnapshot {
  readonly id: string;
  readonly source: string;
  readonly destination: string;
  readonly profile: ConversionProfile;
  readonly state: JobState;
  readonly progress: ProgressEvent;
  readonly outcome: JobOutcome | null;
  readonly timestamps: Readonly<JobTimestamps>;
  readonly options: Readonly<JobOptions>;
  readonly parseWarningCount: number;
  readonly history: ReadonlyArray<JobStateTransition>;
}

interface JobRecord {
  id: string;
  source: string;
  destination: string;
  destinationKey: string;
  profile: ConversionProfile;
  options: JobOptions;
  machine: JobStateMachine;
  progress: JobProgress;
  outcome: JobOutcome | null;
  timestamps: JobTimestamps;
  handle: ProcessHandle | null;
  spawned: boolean;
  cancelRequested: boolean;
  cancelReason: string;
  parseWarningCount: number;
  execution: Promise<void> | null;
  waiters: Array<(snapshot: JobSnapshot) => void>;
}

const CANCELED_BY_USER = 'Canceled by user';

export class JobQueue extends EventEmitter {
  readonly catalog: ProfileCatalog;
  readonly supervisor: ProcessSupervisor;
  readonly bus: EventBus;

  private readonly encoderPath: string;
  private readonly maxConcurrentJobs: number;
  private readonly diagnosticTailLines: number;
  private readonly recognizer: LineRecognizer | undefined;
  private readonly workingDir: string | undefined;
  private readonly log: Logger;

  private readonly jobs = new Map<string, JobRecord>();
  private readonly pending: JobRecord[] = [];
  private readonly running = new Set<JobRecord>();
  private paused = false;

  constructor(options: JobQueueOptions = {}) {
    super();
    const maxConcurrentJobs = options.maxConcurrentJobs ?? 1;
    if (!Number.isInteger(maxConcurrentJobs) || maxConcurrentJobs < 1) {
      throw new ConfigError([`maxConcurrentJobs must be a whole number of at least 1, got ${maxConcurrentJobs}`]);
    }

    this.log = options.logger ?? createLogger({ module: 'job-queue' });
    this.catalog = options.catalog ?? ProfileCatalog.withBuiltins();
    this.supervisor = options.supervisor ?? new ProcessSupervisor({ logger: this.log });
    this.bus = options.bus ?? new EventBus({ logger: this.log });
    this.encoderPath = options.encoderPath ?? 'ffmpeg';
    this.maxConcurrentJobs = maxConcurrentJobs;
    this.diagnosticTailLines = options.diagnosticTailLines ?? 20;
    this.recognizer = options.recognizer;
    this.workingDir = options.workingDir;
  }

  get runningCount(): number {
    return this.running.size;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  /**
   * Add a job to the end of the queue.
   * Throws InvalidProfileError, UnknownProfileError or DuplicateDestinationError
   * without changing any state.
   */
  enqueue(
    source: string,
    destination: string,
    profile: ProfileInput,
    options: JobOptions = {}
  ): string {
    const resolved = this.catalog.toProfile(profile);
    const destinationKey = normalizePath(destination);

    for (const other of this.jobs.values()) {
      if (other.destinationKey === destinationKey && !other.machine.isTerminal()) {
        throw new DuplicateDestinationError(destination, other.id);
      }
    }

    const id = randomUUID();
    const record: JobRecord = {
      id,
      source,
      destination,
      destinationKey,
      profile: resolved,
      options: { ...options },
      machine: new JobStateMachine(id),
      progress: emptyProgress(options.durationMs ?? null),
      outcome: null,
      timestamps: { enqueuedAt: new Date(), startedAt: null, finishedAt: null },
      handle: null,
      spawned: false,
      cancelRequested: false,
      cancelReason: CANCELED_BY_USER,
      parseWarningCount: 0,
      execution: null,
      waiters: [],
    };

    this.jobs.set(id, record);
    this.pending.push(record);
    this.log.info({ jobId: id, source, destination, profile: resolved.id }, 'Job queued');
    this.bus.publish(id, {
      kind: 'queued',
      payload: { source, destination, profileId: resolved.id },
    });

    this.schedule();
    return id;
  }

  /**
   * Cancel a job. Pending jobs are canceled without ever starting;
   * running ones are terminated and awaited.
   */
  async cancel(jobId: string, reason = CANCELED_BY_USER): Promise<JobSnapshot> {
    const record = this.jobs.get(jobId);
    if (!record) {
      throw new JobNotFoundError(jobId);
    }

    const state = record.machine.getState();
    if (isTerminalState(state)) {
      return this.snapshot(record);
    }

    if (state === JobState.PENDING) {
      const index = this.pending.indexOf(record);
      if (index >= 0) this.pending.splice(index, 1);
      this.complete(record, { status: 'canceled', reason });
      return this.snapshot(record);
    }

    record.cancelRequested = true;
    record.cancelReason = reason;
    if (record.handle) {
      this.log.info({ jobId, pid: record.handle.pid }, 'Canceling running job');
      await this.supervisor.cancel(record.handle);
    }
    if (record.execution) {
      await record.execution;
    }
    return this.snapshot(record);
  }

  /**
   * Cancel every pending and running job
   */
  async cancelAll(reason = CANCELED_BY_USER): Promise<void> {
    const pending = [...this.pending];
    const running = [...this.running];
    await Promise.all([...pending, ...running].map(record => this.cancel(record.id, reason)));
  }

  /**
   * Stop promoting pending jobs; running jobs continue
   */
  pauseQueue(): void {
    if (this.paused) return;
    this.paused = true;
    this.log.info({ pending: this.pending.length }, 'Queue paused');
  }

  resumeQueue(): void {
    if (!this.paused) return;
    this.paused = false;
    this.log.info({ pending: this.pending.length }, 'Queue resumed');
    this.schedule();
  }

  get(jobId: string): JobSnapshot | undefined {
    const record = this.jobs.get(jobId);
    return record ? this.snapshot(record) : undefined;
  }

  /**
   * All known jobs in enqueue order
   */
  list(): JobSnapshot[] {
    return Array.from(this.jobs.values(), record => this.snapshot(record));
  }

  /**
   * Job count per state and overall percent over non-canceled jobs.
   * Finished jobs count as complete; pending jobs as 0.
   */
  summary(): JobSummary {
    const counts: Record<JobState, number> = {
      [JobState.PENDING]: 0,
      [JobState.RUNNING]: 0,
      [JobState.SUCCEEDED]: 0,
      [JobState.FAILED]: 0,
      [JobState.CANCELED]: 0,
    };

    let total = 0;
    let considered = 0;
    for (const record of this.jobs.values()) {
      const state = record.machine.getState();
      counts[state] += 1;
      if (state === JobState.CANCELED) continue;

      considered += 1;
      if (state === JobState.SUCCEEDED || state === JobState.FAILED) {
        total += 100;
      } else {
        total += record.progress.percent ?? 0;
      }
    }

    return {
      counts,
      percent: considered > 0 ? Math.round((total / considered) * 100) / 100 : null,
    };
  }

  /**
   * Resolves with the job's terminal snapshot
   */
  waitFor(jobId: string): Promise<JobSnapshot> {
    const record = this.jobs.get(jobId);
    if (!record) {
      return Promise.reject(new JobNotFoundError(jobId));
    }
    if (record.machine.isTerminal()) {
      return Promise.resolve(this.snapshot(record));
    }
    return new Promise(resolve => {
      record.waiters.push(resolve);
    });
  }

  /**
   * Resolves once nothing is running and nothing can be promoted
   */
  whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.once('drained', () => resolve());
    });
  }

  /**
   * Forget terminal jobs; returns how many were removed
   */
  clearFinished(): number {
    let removed = 0;
    for (const [id, record] of this.jobs) {
      if (record.machine.isTerminal()) {
        this.jobs.delete(id);
        this.bus.forget(id);
        removed += 1;
      }
    }
    return removed;
  }

  // Scheduling

  private isIdle(): boolean {
    return this.running.size === 0 && (this.pending.length === 0 || this.paused);
  }

  private schedule(): void {
    while (!this.paused && this.running.size < this.maxConcurrentJobs) {
      const next = this.pending.shift();
      if (!next) break;
      this.promote(next);
    }
  }

  private promote(record: JobRecord): void {
    record.machine.transitionTo(JobState.RUNNING);
    record.timestamps.startedAt = new Date();
    this.running.add(record);

    record.execution = this.execute(record).catch((error: unknown) => {
      this.log.error({ jobId: record.id, error: toErrorMessage(error) }, 'Job bookkeeping failed');
    });
  }

  private async execute(record: JobRecord): Promise<void> {
    let outcome: JobOutcome;
    try {
      outcome = await this.run(record);
    } catch (error) {
      // A cancel that arrived during the pre-spawn checks wins over their failure
      outcome = record.cancelRequested
        ? { status: 'canceled', reason: record.cancelReason }
        : this.failureOutcome(record, error);
    }

    await this.cleanup(record, outcome);
    this.complete(record, outcome);
  }

  private async run(record: JobRecord): Promise<JobOutcome> {
    const { options } = record;
    const canceled = (): JobOutcome => ({ status: 'canceled', reason: record.cancelReason });

    if (record.cancelRequested) return canceled();

    if (!(await isReadableFile(record.source))) {
      throw new SourceNotFoundError(record.source);
    }
    if (!options.overwrite && (await pathExists(record.destination))) {
      throw new DestinationExistsError(record.destination);
    }
    await ensureDir(dirname(record.destination));

    if (record.cancelRequested) return canceled();

    const args = buildConversionCommand(record.profile, record.source, record.destination, {
      overwrite: options.overwrite,
      includeSubtitles: options.includeSubtitles,
    });
    const parser = new OutputParser({
      recognizer: this.recognizer,
      durationMs: options.durationMs,
      diagnosticTailLines: this.diagnosticTailLines,
      logger: this.log.child({ jobId: record.id }),
    });

    const handle = await this.supervisor.start(this.encoderPath, args, {
      cwd: this.workingDir,
      onOutput: (chunk, stream) => {
        for (const event of parser.feed(chunk, stream)) {
          this.onProgress(record, event);
        }
      },
    });
    record.handle = handle;
    record.spawned = true;

    this.log.info({ jobId: record.id, pid: handle.pid }, 'Job started');
    this.bus.publish(record.id, {
      kind: 'started',
      payload: { pid: handle.pid, command: [this.encoderPath, ...args] },
    });

    if (record.cancelRequested) {
      await this.supervisor.cancel(handle);
    }

    const exit = await this.supervisor.awaitExit(handle);
    for (const event of parser.flush()) {
      this.onProgress(record, event);
    }
    record.parseWarningCount = parser.parseWarningCount;

    switch (exit.kind) {
      case 'hung':
      case 'unkillable':
        return {
          status: 'failed',
          code: exit.error.code,
          reason: exit.error.message,
          exitCode: null,
          diagnostics: parser.diagnostics,
        };

      case 'canceled':
      case 'exited': {
        // An encoder that completed before the interrupt reached it still succeeded
        if (exit.kind === 'canceled' && exit.exitCode !== 0) return canceled();

        const status = parser.finalize(exit.exitCode, exit.signal);
        if (status.kind === 'succeeded') {
          record.progress = { ...status.progress };
          return { status: 'succeeded' };
        }
        if (record.cancelRequested) return canceled();
        const error = new EncoderExitError(status.exitCode, status.signal, status.diagnostics);
        this.log.debug({ jobId: record.id, error: error.message }, 'Encoder exited unsuccessfully');
        return {
          status: 'failed',
          code: error.code,
          reason: status.reason,
          exitCode: status.exitCode,
          diagnostics: status.diagnostics,
        };
      }
    }
  }

  private onProgress(record: JobRecord, event: ProgressEvent): void {
    if (record.machine.getState() !== JobState.RUNNING) return;
    record.progress = { ...event };
    this.bus.publish(record.id, { kind: 'progress', payload: event });
  }

  private failureOutcome(record: JobRecord, error: unknown): JobOutcome {
    const code = isEncodeqError(error) ? error.code : 'INTERNAL_ERROR';
    if (!isEncodeqError(error)) {
      this.log.error({ jobId: record.id, error }, 'Unexpected job error');
    }
    return {
      status: 'failed',
      code,
      reason: toErrorMessage(error),
      exitCode: null,
      diagnostics: [],
    };
  }

  private async cleanup(record: JobRecord, outcome: JobOutcome): Promise<void> {
    const { options } = record;

    if (outcome.status !== 'succeeded' && record.spawned && !options.keepPartialOutput) {
      try {
        if (await removeFile(record.destination)) {
          this.log.debug({ jobId: record.id, destination: record.destination }, 'Removed partial output');
        }
      } catch (error) {
        this.log.warn({ jobId: record.id, error: toErrorMessage(error) }, 'Failed to remove partial output');
      }
    }

    if (outcome.status === 'succeeded' && options.deleteSourceOnSuccess) {
      try {
        await removeFile(record.source);
      } catch (error) {
        this.log.warn({ jobId: record.id, error: toErrorMessage(error) }, 'Failed to delete source');
      }
    }
  }

  /**
   * Single exit point of every job: record the outcome, free the slot,
   * notify and pull the next pending job
   */
  private complete(record: JobRecord, outcome: JobOutcome): void {
    const target = outcome.status === 'succeeded'
      ? JobState.SUCCEEDED
      : outcome.status === 'failed' ? JobState.FAILED : JobState.CANCELED;

    const reason = outcome.status === 'succeeded' ? undefined : outcome.reason;
    record.machine.transitionTo(target, reason);
    record.outcome = outcome;
    record.timestamps.finishedAt = new Date();
    record.handle = null;
    this.running.delete(record);

    switch (outcome.status) {
      case 'succeeded':
        this.log.info({ jobId: record.id, destination: record.destination }, 'Job succeeded');
        this.bus.publish(record.id, {
          kind: 'succeeded',
          payload: { progress: Object.freeze({ ...record.progress }), parseWarningCount: record.parseWarningCount },
        });
        break;
      case 'failed':
        this.log.warn({ jobId: record.id, code: outcome.code, reason: outcome.reason }, 'Job failed');
        this.bus.publish(record.id, {
          kind: 'failed',
          payload: { ...outcome, parseWarningCount: record.parseWarningCount },
        });
        break;
      case 'canceled':
        this.log.info({ jobId: record.id, reason: outcome.reason }, 'Job canceled');
        this.bus.publish(record.id, { kind: 'canceled', payload: { reason: outcome.reason } });
        break;
    }

    const snapshot = this.snapshot(record);
    const waiters = record.waiters;
    record.waiters = [];
    for (const resolve of waiters) resolve(snapshot);

    this.schedule();
    if (this.isIdle()) {
      this.emit('drained');
    }
  }

  private snapshot(record: JobRecord): JobSnapshot {
    return Object.freeze({
      id: record.id,
      source: record.source,
      destination: record.destination,
      profile: record.profile,
      state: record.machine.getState(),
      progress: Object.freeze({ ...record.progress }),
      outcome: record.outcome,
      timestamps: Object.freeze({ ...record.timestamps }),
      options: Object.freeze({ ...record.options }),
      parseWarningCount: record.parseWarningCount,
      history: record.machine.getHistory(),
    });
  }
}
