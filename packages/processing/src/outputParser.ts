/**
 * Output Parser
 *
 * Incremental parser for encoder diagnostic output. Chunks may split lines
 * (or multi-byte characters) anywhere; lines end at \n, \r\n or a bare \r,
 * which is what the encoder uses to redraw its stats line.
 *
 * Recognizing lines is delegated to a LineRecognizer so the text format can
 * be swapped per encoder version without touching the buffering logic.
 */

import { StringDecoder } from 'node:string_decoder';
import { createLogger, parseTimecode, type Logger } from '@encodeq/utils';
import { emptyProgress, toErrorMessage, type JobProgress } from '@encodeq/core';

export type OutputStream = 'stdout' | 'stderr';

export type LineMatch =
  | { kind: 'duration'; durationMs: number }
  | {
      kind: 'progress';
      positionMs: number;
      speed: number | null;
      bitrateKbps: number | null;
      frame: number | null;
    }
  | { kind: 'malformed'; reason: string }
  | { kind: 'ignored' };

export interface LineRecognizer {
  readonly name: string;
  recognize(line: string): LineMatch;
}

export type ProgressEvent = Readonly<JobProgress>;

export type StatusEvent =
  | {
      kind: 'succeeded';
      exitCode: 0;
      progress: ProgressEvent;
      parseWarningCount: number;
    }
  | {
      kind: 'failed';
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      reason: string;
      diagnostics: readonly string[];
      progress: ProgressEvent;
      parseWarningCount: number;
    };

const DURATION_LINE = /^\s*Duration:\s*([^,\s]+)/;
const STATS_LINE = /(?:^|\s)(?:frame|size)=\s*\S+.*\btime=/;
const TIME_FIELD = /\btime=\s*(\S+)/;
const SPEED_FIELD = /\bspeed=\s*([\d.]+)x/;
const BITRATE_FIELD = /\bbitrate=\s*([\d.]+)kbits\/s/;
const FRAME_FIELD = /\bframe=\s*(\d+)/;

/**
 * Recognizer for the encoder's default stderr output:
 *
 *   Duration: 00:01:02.50, start: 0.000000, bitrate: 1234 kb/s
 *   frame=  250 fps= 50 q=28.0 size=    512kB time=00:00:10.00 bitrate= 419.4kbits/s speed=2.01x
 */
export const ffmpegStderrRecognizer: LineRecognizer = {
  name: 'ffmpeg-stderr',

  recognize(line: string): LineMatch {
    const duration = DURATION_LINE.exec(line);
    if (duration) {
      const durationMs = parseTimecode(duration[1] ?? '');
      if (durationMs === null || durationMs <= 0) {
        return { kind: 'malformed', reason: `unparseable duration "${duration[1] ?? ''}"` };
      }
      return { kind: 'duration', durationMs };
    }

    if (!STATS_LINE.test(line)) {
      return { kind: 'ignored' };
    }

    const time = TIME_FIELD.exec(line)?.[1] ?? '';
    const positionMs = parseTimecode(time);
    if (positionMs === null) {
      return { kind: 'malformed', reason: `unparseable time "${time}"` };
    }

    const speed = SPEED_FIELD.exec(line)?.[1];
    const bitrate = BITRATE_FIELD.exec(line)?.[1];
    const frame = FRAME_FIELD.exec(line)?.[1];

    return {
      kind: 'progress',
      positionMs: Math.max(0, positionMs),
      speed: speed !== undefined ? Number(speed) : null,
      bitrateKbps: bitrate !== undefined ? Number(bitrate) : null,
      frame: frame !== undefined ? Number(frame) : null,
    };
  },
};

// Checked newest line first when looking for the cause of a failure
const ERROR_PATTERNS: RegExp[] = [
  /No such file or directory/i,
  /Permission denied/i,
  /already exists/i,
  /Unknown encoder/i,
  /Invalid data found/i,
  /\berror\b/i,
  /\binvalid\b/i,
  /Conversion failed/i,
];

export interface OutputParserOptions {
  recognizer?: LineRecognizer;
  durationMs?: number | null;
  diagnosticTailLines?: number;
  logger?: Logger;
}

export class OutputParser {
  private readonly recognizer: LineRecognizer;
  private readonly tailLimit: number;
  private readonly log: Logger;

  private readonly decoders: Record<OutputStream, StringDecoder> = {
    stdout: new StringDecoder('utf8'),
    stderr: new StringDecoder('utf8'),
  };
  private readonly partial: Record<OutputStream, string> = { stdout: '', stderr: '' };
  private readonly tail: string[] = [];

  private progress: JobProgress;
  private speedTotal = 0;
  private speedSamples = 0;
  private warnings = 0;
  private finished = false;

  constructor(options: OutputParserOptions = {}) {
    this.recognizer = options.recognizer ?? ffmpegStderrRecognizer;
    this.tailLimit = Math.max(1, options.diagnosticTailLines ?? 20);
    this.log = options.logger ?? createLogger({ module: 'output-parser' });
    const seeded = options.durationMs !== undefined && options.durationMs !== null && options.durationMs > 0
      ? options.durationMs
      : null;
    this.progress = emptyProgress(seeded);
  }

  get parseWarningCount(): number {
    return this.warnings;
  }

  get durationMs(): number | null {
    return this.progress.durationMs;
  }

  /**
   * Latest progress values
   */
  get current(): ProgressEvent {
    return Object.freeze({ ...this.progress });
  }

  /**
   * Last captured diagnostic lines (stats lines excluded)
   */
  get diagnostics(): readonly string[] {
    return [...this.tail];
  }

  /**
   * Feed a chunk of output; returns one event per complete progress line
   */
  feed(chunk: string | Buffer, stream: OutputStream = 'stderr'): ProgressEvent[] {
    const text = typeof chunk === 'string' ? chunk : this.decoders[stream].write(chunk);
    const lines = (this.partial[stream] + text).split(/\r\n|\r|\n/);
    this.partial[stream] = lines.pop() ?? '';

    const events: ProgressEvent[] = [];
    for (const line of lines) {
      const event = this.consumeLine(line, stream);
      if (event) events.push(event);
    }
    return events;
  }

  /**
   * Process whatever is left in the line buffers
   */
  flush(): ProgressEvent[] {
    const events: ProgressEvent[] = [];
    for (const stream of ['stdout', 'stderr'] as const) {
      const rest = this.partial[stream] + this.decoders[stream].end();
      this.partial[stream] = '';
      for (const line of rest.split(/\r\n|\r|\n/)) {
        const event = this.consumeLine(line, stream);
        if (event) events.push(event);
      }
    }
    return events;
  }

  /**
   * Map the process exit to a terminal status
   */
  finalize(exitCode: number | null, signal: NodeJS.Signals | null = null): StatusEvent {
    if (!this.finished) {
      this.flush();
      this.finished = true;
    }

    if (exitCode === 0) {
      const done: JobProgress = { ...this.progress, etaMs: 0 };
      if (done.durationMs !== null) {
        done.positionMs = Math.max(done.positionMs, done.durationMs);
        done.percent = 100;
      }
      this.progress = done;
      return {
        kind: 'succeeded',
        exitCode: 0,
        progress: this.current,
        parseWarningCount: this.warnings,
      };
    }

    return {
      kind: 'failed',
      exitCode,
      signal,
      reason: this.failureReason(exitCode, signal),
      diagnostics: this.diagnostics,
      progress: this.current,
      parseWarningCount: this.warnings,
    };
  }

  private consumeLine(rawLine: string, stream: OutputStream): ProgressEvent | null {
    const line = rawLine.trimEnd();
    if (line.trim() === '') return null;

    const match = this.recognize(line);

    if (stream === 'stderr' && match.kind !== 'progress') {
      this.tail.push(line.trim());
      if (this.tail.length > this.tailLimit) {
        this.tail.shift();
      }
    }

    switch (match.kind) {
      case 'duration':
        // First occurrence wins: later ones describe outputs, not the input
        if (this.progress.durationMs === null) {
          this.progress.durationMs = match.durationMs;
          this.progress.percent = this.percentOf(this.progress.positionMs, match.durationMs);
        }
        return null;

      case 'progress':
        return this.applyProgress(match);

      case 'malformed':
        this.warnings += 1;
        return null;

      case 'ignored':
        return null;
    }
  }

  /**
   * A recognizer that throws only costs a warning for that line
   */
  private recognize(line: string): LineMatch {
    try {
      return this.recognizer.recognize(line);
    } catch (error) {
      this.log.debug({ recognizer: this.recognizer.name, line, error: toErrorMessage(error) }, 'Line recognizer failed');
      return { kind: 'malformed', reason: `recognizer ${this.recognizer.name} failed: ${toErrorMessage(error)}` };
    }
  }

  private applyProgress(match: Extract<LineMatch, { kind: 'progress' }>): ProgressEvent {
    const positionMs = Math.max(this.progress.positionMs, match.positionMs);

    if (match.speed !== null && Number.isFinite(match.speed) && match.speed > 0) {
      this.speedTotal += match.speed;
      this.speedSamples += 1;
    }
    const averageSpeed = this.speedSamples > 0
      ? round2(this.speedTotal / this.speedSamples)
      : null;

    const { durationMs } = this.progress;
    let etaMs: number | null = null;
    if (durationMs !== null && averageSpeed !== null) {
      etaMs = Math.round(Math.max(0, durationMs - positionMs) / averageSpeed);
    }

    this.progress = {
      positionMs,
      durationMs,
      percent: durationMs !== null ? this.percentOf(positionMs, durationMs) : null,
      speed: match.speed ?? this.progress.speed,
      averageSpeed,
      bitrateKbps: match.bitrateKbps ?? this.progress.bitrateKbps,
      frame: match.frame !== null ? Math.max(match.frame, this.progress.frame ?? 0) : this.progress.frame,
      etaMs,
    };

    return this.current;
  }

  private percentOf(positionMs: number, durationMs: number): number {
    return Math.max(this.progress.percent ?? 0, Math.min(100, round2((positionMs / durationMs) * 100)));
  }

  private failureReason(exitCode: number | null, signal: NodeJS.Signals | null): string {
    for (const pattern of ERROR_PATTERNS) {
      for (let i = this.tail.length - 1; i >= 0; i--) {
        const line = this.tail[i];
        if (line !== undefined && pattern.test(line)) {
          return line;
        }
      }
    }

    const last = this.tail[this.tail.length - 1];
    if (last !== undefined) return last;

    return exitCode !== null
      ? `Encoder exited with code ${exitCode}`
      : `Encoder was killed by ${signal ?? 'a signal'}`;
  }
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
