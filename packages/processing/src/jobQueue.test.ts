import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ConfigError,
  DuplicateDestinationError,
  InvalidProfileError,
  JobNotFoundError,
  JobState,
  UnknownProfileError,
} from '@encodeq/core';
import { pathExists } from '@encodeq/utils';
import type { JobEvent } from './eventBus.js';
import { JobQueue, type JobQueueOptions } from './jobQueue.js';
import { ffmpegStderrRecognizer, type LineRecognizer } from './outputParser.js';
import { ProcessSupervisor } from './processSupervisor.js';
import { FakeSpawner, type FakeChild, type FakeScript } from './testing/fakeSpawn.js';

const exitSoon = (code: number): FakeScript => ({
  run: child => setTimeout(() => child.exit(code), 5),
});

describe('JobQueue', () => {
  let dir: string;
  let spawner: FakeSpawner;
  let queue: JobQueue;

  const file = (name: string) => join(dir, name);

  async function source(name: string): Promise<string> {
    await writeFile(file(name), 'media');
    return file(name);
  }

  function createQueue(options: JobQueueOptions = {}, silenceMs = 1_000): JobQueue {
    const supervisor = new ProcessSupervisor({
      spawn: spawner.spawn,
      outputSilenceTimeoutMs: silenceMs,
      terminationGracePeriodMs: 20,
    });
    queue = new JobQueue({ supervisor, maxConcurrentJobs: 1, ...options });
    return queue;
  }

  async function started(jobId: string): Promise<FakeChild> {
    await vi.waitFor(() => {
      expect(queue.bus.buffered(jobId).some(e => e.kind === 'started')).toBe(true);
    });
    const event = queue.bus.buffered(jobId).find(e => e.kind === 'started');
    const child = spawner.children.find(c => event?.kind === 'started' && c.pid === event.payload.pid);
    if (!child) throw new Error(`no child for ${jobId}`);
    return child;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'encodeq-queue-'));
    spawner = new FakeSpawner();
  });

  afterEach(async () => {
    await queue.cancelAll();
    await queue.supervisor.shutdown();
    await rm(dir, { recursive: true, force: true });
  });

  describe('scheduling', () => {
    it('keeps the second job pending until the first finishes', async () => {
      createQueue();
      const a = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');
      const b = queue.enqueue(await source('in2.mov'), file('out2.mp4'), 'mp4-h264');

      const first = await started(a);
      expect(first.command).toBe('ffmpeg');
      expect(first.args).toEqual([
        '-hide_banner', '-nostdin', '-n',
        '-i', file('in.mov'),
        '-map', '0:v?', '-map', '0:a?',
        '-c:v', 'libx264', '-preset', 'medium', '-crf', '20',
        '-c:a', 'aac', '-b:a', '192k',
        '-movflags', '+faststart', '-pix_fmt', 'yuv420p',
        '-map_metadata', '0',
        file('out.mp4'),
      ]);
      expect(queue.get(a)?.state).toBe(JobState.RUNNING);
      expect(queue.get(b)?.state).toBe(JobState.PENDING);
      expect(spawner.children).toHaveLength(1);

      first.exit(0);
      expect((await queue.waitFor(a)).state).toBe(JobState.SUCCEEDED);

      const second = await started(b);
      expect(queue.get(b)?.state).toBe(JobState.RUNNING);

      second.exit(0);
      await queue.whenIdle();
      expect(queue.get(b)?.outcome).toEqual({ status: 'succeeded' });
    });

    it('never runs more than the configured number of jobs', async () => {
      spawner = new FakeSpawner(exitSoon(0));
      createQueue({ maxConcurrentJobs: 2 });

      const seen: number[] = [];
      queue.bus.subscribe(() => {
        seen.push(queue.runningCount, queue.supervisor.activeCount);
      });

      const ids: string[] = [];
      for (let i = 0; i < 5; i++) {
        ids.push(queue.enqueue(await source(`in${i}.mov`), file(`out${i}.mp4`), 'mp4-h264-low'));
        expect(queue.runningCount).toBeLessThanOrEqual(2);
      }
      await queue.whenIdle();
      await queue.bus.drain();

      expect(Math.max(...seen)).toBeLessThanOrEqual(2);
      expect(spawner.children).toHaveLength(5);
      expect(ids.map(id => queue.get(id)?.state)).toEqual(Array.from({ length: 5 }, () => JobState.SUCCEEDED));
    });

    it('pauses and resumes promotion', async () => {
      createQueue();
      queue.pauseQueue();
      const id = queue.enqueue(await source('in.mov'), file('out.mp3'), 'mp3-audio');

      await queue.whenIdle();
      expect(queue.isPaused).toBe(true);
      expect(queue.get(id)?.state).toBe(JobState.PENDING);
      expect(spawner.children).toHaveLength(0);

      queue.resumeQueue();
      const child = await started(id);
      child.exit(0);
      expect((await queue.waitFor(id)).state).toBe(JobState.SUCCEEDED);
    });

    it('lets running jobs finish while paused', async () => {
      createQueue();
      const a = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');
      const b = queue.enqueue(await source('in2.mov'), file('out2.mp4'), 'mp4-h264');
      const child = await started(a);

      queue.pauseQueue();
      const idle = queue.whenIdle();
      child.exit(0);
      await idle;

      expect(queue.get(a)?.state).toBe(JobState.SUCCEEDED);
      expect(queue.get(b)?.state).toBe(JobState.PENDING);
    });

    it('emits drained when the last job finishes', async () => {
      spawner = new FakeSpawner(exitSoon(0));
      createQueue();
      const drained = vi.fn();
      queue.on('drained', drained);

      queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');
      await queue.whenIdle();

      expect(drained).toHaveBeenCalledTimes(1);
    });
  });

  it('requires a whole number of concurrent jobs', () => {
    createQueue();
    for (const maxConcurrentJobs of [Number.NaN, 0, 1.5]) {
      expect(() => new JobQueue({ supervisor: queue.supervisor, maxConcurrentJobs })).toThrow(ConfigError);
    }
    expect(() => new JobQueue({ supervisor: queue.supervisor, maxConcurrentJobs: Number.NaN }))
      .toThrow('Invalid configuration: maxConcurrentJobs must be a whole number of at least 1, got NaN');
  });

  describe('enqueue', () => {
    it('rejects a destination another active job targets', async () => {
      createQueue();
      const a = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');

      expect(() => queue.enqueue(file('in.mov'), join(dir, 'sub', '..', 'out.mp4'), 'mkv-h265'))
        .toThrow(DuplicateDestinationError);
      expect(queue.list()).toHaveLength(1);

      (await started(a)).exit(0);
      await queue.waitFor(a);
      const again = queue.enqueue(file('in.mov'), file('out.mp4'), 'mp4-h264');
      expect(queue.get(again)?.state).toBe(JobState.RUNNING);
    });

    it('rejects invalid profiles without creating a job', async () => {
      createQueue();
      const input = await source('in.mov');

      expect(() => queue.enqueue(input, file('out.mp4'), { id: 'broken', label: 'Broken', container: 'mp4' }))
        .toThrow(InvalidProfileError);
      expect(() => queue.enqueue(input, file('out.mp4'), 'no-such-profile')).toThrow(UnknownProfileError);
      expect(queue.list()).toEqual([]);
      expect(spawner.children).toEqual([]);
    });

    it('announces queued jobs on the bus', async () => {
      createQueue();
      queue.pauseQueue();
      const id = queue.enqueue(await source('in.mov'), file('out.ogg'), 'ogg-vorbis');

      expect(queue.bus.buffered(id).map(e => [e.kind, e.payload])).toEqual([
        ['queued', { source: file('in.mov'), destination: file('out.ogg'), profileId: 'ogg-vorbis' }],
      ]);
    });
  });

  describe('cancel', () => {
    it('never spawns a canceled pending job', async () => {
      createQueue();
      const a = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');
      const b = queue.enqueue(await source('in2.mov'), file('out2.mp4'), 'mp4-h264');
      const child = await started(a);

      const snapshot = await queue.cancel(b);
      expect(snapshot.state).toBe(JobState.CANCELED);
      expect(snapshot.outcome).toEqual({ status: 'canceled', reason: 'Canceled by user' });

      child.exit(0);
      await queue.whenIdle();
      expect(spawner.children).toHaveLength(1);
      expect(queue.bus.buffered(b).map(e => e.kind)).toEqual(['queued', 'canceled']);
    });

    it('terminates a running job and removes its partial output', async () => {
      createQueue();
      const id = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');
      const child = await started(id);
      await writeFile(file('out.mp4'), 'partial');

      const snapshot = await queue.cancel(id);

      expect(snapshot.state).toBe(JobState.CANCELED);
      expect(child.signals).toEqual(['SIGINT']);
      expect(await pathExists(file('out.mp4'))).toBe(false);
      expect(queue.supervisor.activeCount).toBe(0);
    });

    it('keeps partial output when asked', async () => {
      createQueue();
      const id = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264', { keepPartialOutput: true });
      await started(id);
      await writeFile(file('out.mp4'), 'partial');

      await queue.cancel(id);

      expect(await readFile(file('out.mp4'), 'utf8')).toBe('partial');
    });

    it('cancels everything at once', async () => {
      createQueue();
      const ids = [
        queue.enqueue(await source('a.mov'), file('a.mp4'), 'mp4-h264'),
        queue.enqueue(await source('b.mov'), file('b.mp4'), 'mp4-h264'),
        queue.enqueue(await source('c.mov'), file('c.mp4'), 'mp4-h264'),
      ];
      const [first] = ids;
      if (first === undefined) throw new Error('no job');
      await started(first);

      await queue.cancelAll();

      expect(ids.map(id => queue.get(id)?.state)).toEqual(Array.from({ length: 3 }, () => JobState.CANCELED));
      expect(spawner.children).toHaveLength(1);
      expect(queue.runningCount).toBe(0);
    });

    it('leaves finished jobs alone', async () => {
      spawner = new FakeSpawner(exitSoon(0));
      createQueue();
      const id = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');
      await queue.waitFor(id);

      expect((await queue.cancel(id)).state).toBe(JobState.SUCCEEDED);
    });

    it('keeps the output of an encoder that finished as it was canceled', async () => {
      spawner.script({ exitOn: [] });
      createQueue();
      const id = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');
      const child = await started(id);
      await writeFile(file('out.mp4'), 'complete');

      const canceling = queue.cancel(id);
      setTimeout(() => child.exit(0), 5);
      const snapshot = await canceling;

      expect(child.signals[0]).toBe('SIGINT');
      expect(snapshot.state).toBe(JobState.SUCCEEDED);
      expect(snapshot.outcome).toEqual({ status: 'succeeded' });
      expect(await readFile(file('out.mp4'), 'utf8')).toBe('complete');
    });

    it('lets a cancel win over a failing pre-start check', async () => {
      createQueue();
      const id = queue.enqueue(file('nope.mov'), file('out.mp4'), 'mp4-h264');

      const snapshot = await queue.cancel(id, 'Stopped early');

      expect(snapshot.state).toBe(JobState.CANCELED);
      expect(snapshot.outcome).toEqual({ status: 'canceled', reason: 'Stopped early' });
      expect(spawner.children).toEqual([]);
    });

    it('records the given reason for a running job', async () => {
      createQueue();
      const id = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');
      await started(id);

      const snapshot = await queue.cancel(id, 'Interrupted');

      expect(snapshot.outcome).toEqual({ status: 'canceled', reason: 'Interrupted' });
      expect(queue.bus.buffered(id).at(-1)?.payload).toEqual({ reason: 'Interrupted' });
    });

    it('rejects unknown ids', async () => {
      createQueue();
      await expect(queue.cancel('missing')).rejects.toThrow(JobNotFoundError);
      await expect(queue.waitFor('missing')).rejects.toThrow(JobNotFoundError);
    });
  });

  describe('failures', () => {
    it('fails a silent job with a hang timeout and moves on', async () => {
      spawner.script({}).script(exitSoon(0));
      createQueue({}, 40);
      const hung = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');
      const next = queue.enqueue(await source('in2.mov'), file('out2.mp4'), 'mp4-h264');

      const snapshot = await queue.waitFor(hung);
      expect(snapshot.state).toBe(JobState.FAILED);
      expect(snapshot.outcome).toMatchObject({
        status: 'failed',
        code: 'HANG_TIMEOUT',
        reason: 'ffmpeg produced no output for 40ms and was terminated',
      });

      expect((await queue.waitFor(next)).state).toBe(JobState.SUCCEEDED);
      expect(queue.supervisor.activeCount).toBe(0);
    });

    it('fails a job whose process survives termination and moves on', async () => {
      spawner.script({ exitOn: [] }).script(exitSoon(0));
      createQueue({}, 40);
      const stuck = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');
      const next = queue.enqueue(await source('in2.mov'), file('out2.mp4'), 'mp4-h264');

      const snapshot = await queue.waitFor(stuck);
      expect(snapshot.state).toBe(JobState.FAILED);
      expect(snapshot.outcome).toMatchObject({
        status: 'failed',
        code: 'TERMINATION_FAILED',
        reason: 'ffmpeg (pid 1000) did not exit after 3 termination attempts',
        exitCode: null,
      });
      expect(spawner.children[0]?.signals).toEqual(['SIGINT', 'SIGKILL', 'SIGKILL']);

      expect((await queue.waitFor(next)).state).toBe(JobState.SUCCEEDED);
      expect(queue.runningCount).toBe(0);
      expect(queue.supervisor.activeCount).toBe(0);
    });

    it('survives a recognizer that throws', async () => {
      const recognizer: LineRecognizer = {
        name: 'fragile',
        recognize(line) {
          if (line.includes('boom')) throw new Error('recognizer bug');
          return ffmpegStderrRecognizer.recognize(line);
        },
      };
      spawner = new FakeSpawner({
        run: child => setTimeout(() => {
          child.writeStderr('boom\n');
          setTimeout(() => child.exit(0), 5);
        }, 5),
      });
      createQueue({ recognizer });
      const id = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');

      const snapshot = await queue.waitFor(id);
      expect(snapshot.state).toBe(JobState.SUCCEEDED);
      expect(snapshot.parseWarningCount).toBe(1);
    });

    it('reports the encoder diagnostics', async () => {
      spawner = new FakeSpawner({
        run: child => setTimeout(() => {
          child.writeStderr('[aac @ 0x1] Too many bits per frame requested\n');
          child.writeStderr('Error initializing output stream 0:1 -- Error while opening encoder\n');
          setTimeout(() => child.exit(1), 5);
        }, 5),
      });
      createQueue();
      const failed: JobEvent[] = [];
      const id = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');
      queue.bus.subscribe(event => {
        if (event.kind === 'failed') failed.push(event);
      }, { jobId: id });

      const snapshot = await queue.waitFor(id);
      await queue.bus.drain();

      const expected = {
        status: 'failed',
        code: 'ENCODER_FAILED',
        reason: 'Error initializing output stream 0:1 -- Error while opening encoder',
        exitCode: 1,
        diagnostics: [
          '[aac @ 0x1] Too many bits per frame requested',
          'Error initializing output stream 0:1 -- Error while opening encoder',
        ],
      };
      expect(snapshot.outcome).toEqual(expected);
      expect(failed.map(e => e.payload)).toEqual([{ ...expected, parseWarningCount: 0 }]);
    });

    it('fails when the encoder cannot be started', async () => {
      spawner.script({ failToSpawn: 'ENOENT' }).script(exitSoon(0));
      createQueue({ encoderPath: '/missing/ffmpeg' });
      const a = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');
      const b = queue.enqueue(await source('in2.mov'), file('out2.mp4'), 'mp4-h264');

      expect((await queue.waitFor(a)).outcome).toMatchObject({
        status: 'failed',
        code: 'SPAWN_FAILED',
        reason: 'Failed to start /missing/ffmpeg: spawn /missing/ffmpeg ENOENT',
      });
      expect((await queue.waitFor(b)).state).toBe(JobState.SUCCEEDED);
    });

    it('fails without spawning when the source is missing', async () => {
      createQueue();
      const id = queue.enqueue(file('nope.mov'), file('out.mp4'), 'mp4-h264');

      expect((await queue.waitFor(id)).outcome).toMatchObject({ status: 'failed', code: 'SOURCE_NOT_FOUND' });
      expect(spawner.children).toEqual([]);
    });

    it('does not overwrite an existing destination by default', async () => {
      createQueue();
      await writeFile(file('out.mp4'), 'keep me');
      const id = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');

      expect((await queue.waitFor(id)).outcome).toMatchObject({ status: 'failed', code: 'DESTINATION_EXISTS' });
      expect(await readFile(file('out.mp4'), 'utf8')).toBe('keep me');
      expect(spawner.children).toEqual([]);
    });

    it('overwrites when asked', async () => {
      spawner = new FakeSpawner(exitSoon(0));
      createQueue();
      await writeFile(file('out.mp4'), 'old');
      const id = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264', { overwrite: true });

      expect((await queue.waitFor(id)).state).toBe(JobState.SUCCEEDED);
      expect(spawner.last?.args.slice(0, 3)).toEqual(['-hide_banner', '-nostdin', '-y']);
    });
  });

  describe('progress', () => {
    it('republishes parsed progress and completes it on success', async () => {
      spawner = new FakeSpawner({
        run: child => setTimeout(() => {
          child.writeStderr('  Duration: 00:00:20.00, start: 0.000000, bitrate: 1500 kb/s\n');
          child.writeStderr('frame=  120 fps= 60 q=28.0 size=     256kB time=00:00:05.00 bitrate= 419.4kbits/s speed=2.00x\r');
          setTimeout(() => child.exit(0), 5);
        }, 5),
      });
      createQueue();
      const events: JobEvent[] = [];
      queue.bus.subscribe(event => {
        events.push(event);
      });

      const id = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');
      const snapshot = await queue.waitFor(id);
      await queue.bus.drain();

      expect(events.map(e => e.kind)).toEqual(['queued', 'started', 'progress', 'succeeded']);
      expect(events.map(e => e.seq)).toEqual([1, 2, 3, 4]);
      expect(events[2]?.payload).toMatchObject({ positionMs: 5000, durationMs: 20000, percent: 25, etaMs: 7500 });
      expect(snapshot.progress).toMatchObject({ positionMs: 20000, percent: 100, etaMs: 0 });
      expect(queue.summary()).toEqual({
        counts: { PENDING: 0, RUNNING: 0, SUCCEEDED: 1, FAILED: 0, CANCELED: 0 },
        percent: 100,
      });
    });

    it('seeds the duration from the job options', async () => {
      createQueue();
      const id = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264', { durationMs: 8000 });
      const child = await started(id);

      child.writeStderr('frame=  10 fps=10 q=28.0 size=  1kB time=00:00:02.00 bitrate=1.0kbits/s speed=1.00x\r');
      await vi.waitFor(() => {
        expect(queue.get(id)?.progress.percent).toBe(25);
      });
      expect(queue.summary().percent).toBe(25);
    });
  });

  describe('housekeeping', () => {
    it('deletes the source after success when asked', async () => {
      spawner = new FakeSpawner(exitSoon(0));
      createQueue();
      const input = await source('in.wav');
      const id = queue.enqueue(input, file('out.flac'), 'flac-audio', { deleteSourceOnSuccess: true });

      await queue.waitFor(id);
      expect(await pathExists(input)).toBe(false);
    });

    it('summarizes and clears finished jobs', async () => {
      createQueue();
      const a = queue.enqueue(await source('a.mov'), file('a.mp4'), 'mp4-h264');
      const b = queue.enqueue(await source('b.mov'), file('b.mp4'), 'mp4-h264');
      await queue.cancel(b);
      const child = await started(a);

      expect(queue.summary()).toEqual({
        counts: { PENDING: 0, RUNNING: 1, SUCCEEDED: 0, FAILED: 0, CANCELED: 1 },
        percent: 0,
      });

      child.exit(0);
      await queue.waitFor(a);

      expect(queue.clearFinished()).toBe(2);
      expect(queue.list()).toEqual([]);
      expect(queue.bus.lastSeq(a)).toBe(0);
    });

    it('returns frozen snapshots', async () => {
      createQueue();
      queue.pauseQueue();
      const id = queue.enqueue(await source('in.mov'), file('out.mp4'), 'mp4-h264');
      const snapshot = queue.get(id);

      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot?.progress)).toBe(true);
      expect(snapshot?.profile.id).toBe('mp4-h264');
    });
  });
});
