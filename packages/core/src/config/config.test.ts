import { describe, it, expect } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '../errors/index.js';
import { resolveBinaryPath } from './binaries.js';
import { loadConfig } from './index.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.queue.maxConcurrentJobs).toBe(1);
    expect(config.supervisor).toEqual({
      outputSilenceTimeoutMs: 60_000,
      terminationGracePeriodMs: 3_000,
      maxTerminationAttempts: 3,
    });
    expect(config.parser.diagnosticTailLines).toBe(20);
    expect(config.events.replayBufferSize).toBe(50);
    expect(config.logLevel).toBe('info');
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({
      MAX_CONCURRENT_JOBS: '4',
      OUTPUT_SILENCE_TIMEOUT_MS: '1500',
      FFMPEG_PATH: '/opt/tools/ffmpeg',
    });

    expect(config.queue.maxConcurrentJobs).toBe(4);
    expect(config.supervisor.outputSilenceTimeoutMs).toBe(1500);
    expect(config.binaries.ffmpeg).toEqual({
      name: 'ffmpeg',
      envVar: 'FFMPEG_PATH',
      resolvedPath: '/opt/tools/ffmpeg',
      source: 'env',
    });
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ MAX_CONCURRENT_JOBS: '  ' }).queue.maxConcurrentJobs).toBe(1);
  });

  it('rejects out-of-range values', () => {
    expect(() => loadConfig({ MAX_CONCURRENT_JOBS: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ MAX_TERMINATION_ATTEMPTS: '1' })).toThrow(/MAX_TERMINATION_ATTEMPTS/);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
  });
});

describe('resolveBinaryPath', () => {
  it('falls back to the system PATH', async () => {
    const root = await mkdtemp(join(tmpdir(), 'encodeq-bin-'));
    try {
      expect(resolveBinaryPath('ffprobe', 'FFPROBE_PATH', undefined, root)).toEqual({
        name: 'ffprobe',
        envVar: 'FFPROBE_PATH',
        resolvedPath: 'ffprobe',
        source: 'path',
      });
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });

  it.runIf(process.platform === 'linux')('prefers a bundled binary over PATH', async () => {
    const root = await mkdtemp(join(tmpdir(), 'encodeq-bin-'));
    try {
      await mkdir(join(root, 'linux'));
      await writeFile(join(root, 'linux', 'ffmpeg'), '');

      const resolved = resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', undefined, root);
      expect(resolved.source).toBe('bundled');
      expect(resolved.resolvedPath).toBe(join(root, 'linux', 'ffmpeg'));
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });
});
