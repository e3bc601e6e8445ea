/**
 * Media Prober
 *
 * Reads container and stream metadata through ffprobe's JSON output. Runs
 * under the Process Supervisor, so a prober that never returns is caught
 * by the same liveness timeout as the encoder.
 */

import { ProbeError, toErrorMessage } from '@encodeq/core';
import { createLogger, type Logger } from '@encodeq/utils';
import { z } from 'zod';
import { ProcessSupervisor } from './processSupervisor.js';

const numeric = z.union([z.string(), z.number()]).optional();

const ffprobeOutputSchema = z.object({
  format: z.object({
    format_name: z.string().optional(),
    duration: numeric,
    bit_rate: numeric,
  }).passthrough(),
  streams: z.array(z.object({
    index: z.number().int(),
    codec_type: z.string().optional(),
    codec_name: z.string().optional(),
    width: z.number().int().optional(),
    height: z.number().int().optional(),
    channels: z.number().int().optional(),
    sample_rate: numeric,
  }).passthrough()).default([]),
});

export interface ProbedStream {
  index: number;
  type: string;
  codec: string | null;
  width?: number;
  height?: number;
  channels?: number;
  sampleRate?: number;
}

export interface ProbeResult {
  durationMs: number | null;
  formatName: string | null;
  bitRate: number | null;
  streams: ProbedStream[];
}

export interface MediaProberOptions {
  ffprobePath?: string;
  supervisor?: ProcessSupervisor;
  logger?: Logger;
}

export class MediaProber {
  private readonly ffprobePath: string;
  private readonly supervisor: ProcessSupervisor;
  private readonly log: Logger;

  constructor(options: MediaProberOptions = {}) {
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
    this.log = options.logger ?? createLogger({ module: 'media-prober' });
    this.supervisor = options.supervisor ?? new ProcessSupervisor({ logger: this.log });
  }

  async probe(file: string): Promise<ProbeResult> {
    const args = [
      '-v', 'error',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      file,
    ];

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    const handle = await this.supervisor.start(this.ffprobePath, args, {
      onOutput: (chunk, stream) => {
        (stream === 'stdout' ? stdout : stderr).push(chunk);
      },
    });
    const exit = await this.supervisor.awaitExit(handle);

    switch (exit.kind) {
      case 'hung':
      case 'unkillable':
        throw exit.error;
      case 'canceled':
        throw new ProbeError(file, 'probe was canceled');
      case 'exited':
        break;
    }

    if (exit.exitCode !== 0) {
      const message = Buffer.concat(stderr).toString('utf8').trim();
      throw new ProbeError(file, message || `ffprobe exited with code ${exit.exitCode ?? exit.signal ?? 'unknown'}`);
    }

    const text = Buffer.concat(stdout).toString('utf8');
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      this.log.debug({ file, output: text.substring(0, 200) }, 'Unparseable ffprobe output');
      throw new ProbeError(file, `invalid JSON output (${toErrorMessage(error)})`);
    }

    const parsed = ffprobeOutputSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProbeError(file, parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
    }

    const { format, streams } = parsed.data;
    const durationSeconds = toNumber(format.duration);

    return {
      durationMs: durationSeconds !== null ? Math.round(durationSeconds * 1000) : null,
      formatName: format.format_name ?? null,
      bitRate: toNumber(format.bit_rate),
      streams: streams.map(stream => {
        const info: ProbedStream = {
          index: stream.index,
          type: stream.codec_type ?? 'unknown',
          codec: stream.codec_name ?? null,
        };
        if (stream.width !== undefined) info.width = stream.width;
        if (stream.height !== undefined) info.height = stream.height;
        if (stream.channels !== undefined) info.channels = stream.channels;
        const sampleRate = toNumber(stream.sample_rate);
        if (sampleRate !== null) info.sampleRate = sampleRate;
        return info;
      }),
    };
  }
}

function toNumber(value: string | number | undefined): number | null {
  if (value === undefined) return null;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : null;
}
