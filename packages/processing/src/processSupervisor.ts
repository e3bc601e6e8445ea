/**
 * Process Supervisor
 *
 * Spawns external tools, watches their output for liveness and guarantees
 * that a canceled or hung process is really gone before reporting back.
 *
 * Termination escalates: SIGINT first (the encoder finalizes its output and
 * exits), then SIGKILL, each attempt waiting one grace period for the exit.
 */

import { spawn as nodeSpawn } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import type { Readable } from 'node:stream';
import {
  HangTimeoutError,
  SpawnError,
  TerminationFailedError,
  toErrorMessage,
} from '@encodeq/core';
import { createLogger, isErrnoException, type Logger } from '@encodeq/utils';
import type { OutputStream } from './outputParser.js';

/**
 * The part of a child process the supervisor relies on.
 * Node's ChildProcess satisfies it; tests pass in-process fakes.
 */
export interface SupervisedChild extends EventEmitter {
  readonly pid?: number | undefined;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export interface SpawnRequest {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdio: ['ignore', 'pipe', 'pipe'];
  windowsHide: boolean;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnRequest
) => SupervisedChild;

const defaultSpawn: SpawnFunction = (command, args, options) =>
  nodeSpawn(command, [...args], options);

export interface ProcessSupervisorOptions {
  outputSilenceTimeoutMs?: number;
  terminationGracePeriodMs?: number;
  maxTerminationAttempts?: number;
  spawn?: SpawnFunction;
  logger?: Logger;
}

export interface StartOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  outputSilenceTimeoutMs?: number;
  /** Attached before the process starts, so no output is missed */
  onOutput?: (chunk: Buffer, stream: OutputStream) => void;
}

export type ExitOutcome =
  | { kind: 'exited'; exitCode: number | null; signal: NodeJS.Signals | null }
  | { kind: 'canceled'; exitCode: number | null; signal: NodeJS.Signals | null }
  | { kind: 'hung'; error: HangTimeoutError }
  | { kind: 'unkillable'; error: TerminationFailedError };

/**
 * One live external process.
 * Emits 'output' (chunk, stream) for every chunk read from stdout/stderr.
 */
export class ProcessHandle extends EventEmitter {
  readonly id = randomUUID();

  constructor(
    readonly executable: string,
    readonly args: readonly string[],
    readonly pid: number | undefined
  ) {
    super();
  }
}

interface ProcessRecord {
  child: SupervisedChild;
  silenceTimeoutMs: number;
  silenceTimer: NodeJS.Timeout | null;
  drainTimer: NodeJS.Timeout | null;
  exit: { exitCode: number | null; signal: NodeJS.Signals | null } | null;
  endReason: 'cancel' | 'hang' | null;
  termination: Promise<void> | null;
  exitWaiters: Array<() => void>;
  settled: boolean;
  outcome: Promise<ExitOutcome>;
  settle: (outcome: ExitOutcome) => void;
}

export class ProcessSupervisor {
  private readonly silenceTimeoutMs: number;
  private readonly gracePeriodMs: number;
  private readonly maxAttempts: number;
  private readonly spawnFn: SpawnFunction;
  private readonly log: Logger;

  private readonly records = new WeakMap<ProcessHandle, ProcessRecord>();
  private readonly live = new Set<ProcessHandle>();

  constructor(options: ProcessSupervisorOptions = {}) {
    this.silenceTimeoutMs = options.outputSilenceTimeoutMs ?? 60_000;
    this.gracePeriodMs = options.terminationGracePeriodMs ?? 3_000;
    this.maxAttempts = Math.max(2, options.maxTerminationAttempts ?? 3);
    this.spawnFn = options.spawn ?? defaultSpawn;
    this.log = options.logger ?? createLogger({ module: 'process-supervisor' });
  }

  /**
   * Number of processes that have not exited yet
   */
  get activeCount(): number {
    return this.live.size;
  }

  /**
   * Spawn a process with captured output.
   * Rejects with SpawnError if the executable cannot be started.
   */
  async start(
    executable: string,
    args: readonly string[],
    options: StartOptions = {}
  ): Promise<ProcessHandle> {
    let child: SupervisedChild;
    try {
      child = this.spawnFn(executable, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });
    } catch (error) {
      throw this.toSpawnError(executable, error);
    }

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off('error', onError);
        resolve();
      };
      const onError = (error: unknown): void => {
        child.off('spawn', onSpawn);
        reject(this.toSpawnError(executable, error));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    const handle = new ProcessHandle(executable, args, child.pid);
    const record = this.createRecord(child, options.outputSilenceTimeoutMs ?? this.silenceTimeoutMs);
    this.records.set(handle, record);
    this.live.add(handle);

    const onData = (stream: OutputStream) => (data: Buffer | string): void => {
      const chunk = typeof data === 'string' ? Buffer.from(data) : data;
      this.armSilenceTimer(handle, record);
      this.deliver(handle, stream, () => options.onOutput?.(chunk, stream));
      this.deliver(handle, stream, () => handle.emit('output', chunk, stream));
    };
    child.stdout?.on('data', onData('stdout'));
    child.stderr?.on('data', onData('stderr'));

    child.on('exit', (exitCode: number | null, signal: NodeJS.Signals | null) => {
      this.onExit(handle, record, exitCode, signal);
    });
    child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
      if (!record.exit) {
        this.onExit(handle, record, exitCode, signal);
      }
      this.finish(handle, record);
    });
    child.on('error', (error: Error) => {
      // After a successful spawn this only reports failed signal delivery
      this.log.warn({ pid: child.pid, executable, error: error.message }, 'Child process error');
    });

    this.armSilenceTimer(handle, record);
    this.log.debug({ pid: child.pid, executable, args }, 'Process started');

    return handle;
  }

  /**
   * Request termination: interrupt, then kill after the grace period.
   * No-op for a process that already exited.
   */
  async cancel(handle: ProcessHandle): Promise<void> {
    const record = this.records.get(handle);
    if (!record || record.exit || record.settled) return;

    if (record.endReason === null) {
      record.endReason = 'cancel';
    }
    await this.terminate(handle, record);
  }

  /**
   * Resolves when the process exits, is canceled, hangs or cannot be killed
   */
  awaitExit(handle: ProcessHandle): Promise<ExitOutcome> {
    const record = this.records.get(handle);
    if (!record) {
      return Promise.reject(new Error(`Unknown process handle ${handle.id}`));
    }
    return record.outcome;
  }

  isRunning(handle: ProcessHandle): boolean {
    return this.live.has(handle);
  }

  /**
   * Cancel every live process
   */
  async shutdown(): Promise<void> {
    await Promise.all(Array.from(this.live, handle => this.cancel(handle)));
  }

  // Private methods

  private createRecord(child: SupervisedChild, silenceTimeoutMs: number): ProcessRecord {
    let settle: (outcome: ExitOutcome) => void = () => undefined;
    const outcome = new Promise<ExitOutcome>(resolve => {
      settle = resolve;
    });

    return {
      child,
      silenceTimeoutMs,
      silenceTimer: null,
      drainTimer: null,
      exit: null,
      endReason: null,
      termination: null,
      exitWaiters: [],
      settled: false,
      outcome,
      settle,
    };
  }

  private armSilenceTimer(handle: ProcessHandle, record: ProcessRecord): void {
    if (record.silenceTimer) clearTimeout(record.silenceTimer);
    if (record.exit || record.settled || record.termination) {
      record.silenceTimer = null;
      return;
    }
    record.silenceTimer = setTimeout(() => {
      record.silenceTimer = null;
      this.onSilence(handle, record);
    }, record.silenceTimeoutMs);
  }

  private onSilence(handle: ProcessHandle, record: ProcessRecord): void {
    if (record.exit || record.settled || record.termination) return;

    this.log.warn(
      { pid: handle.pid, executable: handle.executable, silenceMs: record.silenceTimeoutMs },
      'No output within silence window, terminating'
    );
    record.endReason = 'hang';
    // The outcome promise reports the result; the returned promise never rejects
    record.termination = this.escalate(handle, record);
  }

  private terminate(handle: ProcessHandle, record: ProcessRecord): Promise<void> {
    if (record.exit) return Promise.resolve();
    if (!record.termination) {
      if (record.silenceTimer) {
        clearTimeout(record.silenceTimer);
        record.silenceTimer = null;
      }
      record.termination = this.escalate(handle, record);
    }
    return record.termination;
  }

  private async escalate(handle: ProcessHandle, record: ProcessRecord): Promise<void> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (record.exit) return;

      const signal: NodeJS.Signals = attempt === 1 ? 'SIGINT' : 'SIGKILL';
      this.log.warn({ pid: handle.pid, attempt, signal }, 'Sending termination signal');
      try {
        record.child.kill(signal);
      } catch (error) {
        this.log.warn({ pid: handle.pid, signal, error: String(error) }, 'Signal delivery failed');
      }

      if (await this.waitForExit(record, this.gracePeriodMs)) return;
    }

    const error = new TerminationFailedError(handle.executable, this.maxAttempts, handle.pid);
    this.log.error({ pid: handle.pid, attempts: this.maxAttempts }, error.message);
    this.settle(handle, record, { kind: 'unkillable', error });
  }

  private waitForExit(record: ProcessRecord, timeoutMs: number): Promise<boolean> {
    if (record.exit) return Promise.resolve(true);

    return new Promise<boolean>(resolve => {
      const timer = setTimeout(() => {
        record.exitWaiters = record.exitWaiters.filter(w => w !== onExit);
        resolve(false);
      }, timeoutMs);
      const onExit = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      record.exitWaiters.push(onExit);
    });
  }

  private onExit(
    handle: ProcessHandle,
    record: ProcessRecord,
    exitCode: number | null,
    signal: NodeJS.Signals | null
  ): void {
    if (record.exit) return;
    record.exit = { exitCode, signal };

    if (record.silenceTimer) {
      clearTimeout(record.silenceTimer);
      record.silenceTimer = null;
    }

    const waiters = record.exitWaiters;
    record.exitWaiters = [];
    for (const waiter of waiters) waiter();

    // 'close' normally follows once the pipes drain; a grandchild holding
    // them open must not keep the job alive
    record.drainTimer = setTimeout(() => {
      record.drainTimer = null;
      record.child.stdout?.destroy();
      record.child.stderr?.destroy();
      this.finish(handle, record);
    }, this.gracePeriodMs);
  }

  private finish(handle: ProcessHandle, record: ProcessRecord): void {
    if (record.settled || !record.exit) return;

    const { exitCode, signal } = record.exit;
    switch (record.endReason) {
      case 'hang':
        this.settle(handle, record, {
          kind: 'hung',
          error: new HangTimeoutError(handle.executable, record.silenceTimeoutMs, handle.pid),
        });
        break;
      case 'cancel':
        this.settle(handle, record, { kind: 'canceled', exitCode, signal });
        break;
      default:
        this.settle(handle, record, { kind: 'exited', exitCode, signal });
    }
  }

  private settle(handle: ProcessHandle, record: ProcessRecord, outcome: ExitOutcome): void {
    if (record.settled) return;
    record.settled = true;

    if (record.silenceTimer) clearTimeout(record.silenceTimer);
    if (record.drainTimer) clearTimeout(record.drainTimer);
    record.silenceTimer = null;
    record.drainTimer = null;

    this.live.delete(handle);
    this.log.debug({ pid: handle.pid, outcome: outcome.kind }, 'Process finished');
    record.settle(outcome);
  }

  /**
   * Run an output consumer; its errors are logged, never thrown into the pipe
   */
  private deliver(handle: ProcessHandle, stream: OutputStream, consumer: () => void): void {
    try {
      consumer();
    } catch (error) {
      this.log.error({ pid: handle.pid, stream, error: toErrorMessage(error) }, 'Output handler failed');
    }
  }

  private toSpawnError(executable: string, error: unknown): SpawnError {
    if (error instanceof SpawnError) return error;
    const message = error instanceof Error ? error.message : String(error);
    const code = isErrnoException(error) ? error.code : undefined;
    return new SpawnError(executable, message, code);
  }
}
