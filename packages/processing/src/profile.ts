/**
 * Conversion Profiles
 *
 * A profile names a target container plus codec and quality settings.
 * Profiles are validated once, when created, and are frozen afterwards:
 * anything holding a ConversionProfile can render it without further checks.
 */

import { z } from 'zod';
import { InvalidProfileError } from '@encodeq/core';
import { FFmpegCommandBuilder } from './commandBuilder.js';

// Containers that cannot carry a video stream
export const AUDIO_ONLY_CONTAINERS: ReadonlySet<string> = new Set([
  'mp3', 'ogg', 'flac', 'm4a', 'wav', 'opus', 'aac',
]);

const WEBM_VIDEO_CODECS: ReadonlySet<string> = new Set(['libvpx', 'libvpx-vp9', 'libaom-av1', 'copy']);
const WEBM_AUDIO_CODECS: ReadonlySet<string> = new Set(['libopus', 'libvorbis', 'copy']);

// The queue owns input, output and overwrite handling
const RESERVED_FLAGS: ReadonlySet<string> = new Set(['-i', '-y', '-n']);

const bitrate = z.string().regex(/^\d+(\.\d+)?[kKmM]?$/, 'must look like 192k or 2M');

const qualitySchema = z.object({
  crf: z.number().int().min(0).max(63).optional(),
  preset: z.string().min(1).optional(),
  videoBitrate: bitrate.optional(),
  audioBitrate: bitrate.optional(),
  audioSampleRate: z.number().int().positive().optional(),
  audioChannels: z.number().int().min(1).max(8).optional(),
  scale: z.string().regex(/^-?\d+:-?\d+$/, 'must look like 1280:-2').optional(),
}).strict();

export const profileDefinitionSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'must be lowercase letters, digits and dashes'),
  label: z.string().min(1),
  container: z.string().regex(/^[a-z0-9]+$/, 'must be a bare extension such as mp4'),
  videoCodec: z.string().min(1).optional(),
  audioCodec: z.string().min(1).optional(),
  quality: qualitySchema.default({}),
  extraFlags: z.array(z.string().min(1)).default([]),
}).strict().superRefine((profile, ctx) => {
  const issue = (message: string, path: (string | number)[] = []) =>
    ctx.addIssue({ code: z.ZodIssueCode.custom, message, path });

  const { videoCodec, audioCodec, quality, container } = profile;

  if (!videoCodec && !audioCodec) {
    issue('at least one of videoCodec or audioCodec is required');
  }

  if (videoCodec && AUDIO_ONLY_CONTAINERS.has(container)) {
    issue(`audio-only container ${container} cannot take a video codec`, ['videoCodec']);
  }

  if (container === 'webm') {
    if (videoCodec && !WEBM_VIDEO_CODECS.has(videoCodec)) {
      issue(`webm does not accept video codec ${videoCodec}`, ['videoCodec']);
    }
    if (audioCodec && !WEBM_AUDIO_CODECS.has(audioCodec)) {
      issue(`webm does not accept audio codec ${audioCodec}`, ['audioCodec']);
    }
  }

  if (quality.crf !== undefined && quality.videoBitrate !== undefined) {
    issue('crf and videoBitrate are mutually exclusive', ['quality']);
  }

  const hasVideoQuality = quality.crf !== undefined
    || quality.videoBitrate !== undefined
    || quality.preset !== undefined
    || quality.scale !== undefined;
  if (hasVideoQuality && (!videoCodec || videoCodec === 'copy')) {
    issue('video quality settings need a re-encoding video codec', ['quality']);
  }

  const hasAudioQuality = quality.audioBitrate !== undefined
    || quality.audioSampleRate !== undefined
    || quality.audioChannels !== undefined;
  if (hasAudioQuality && (!audioCodec || audioCodec === 'copy')) {
    issue('audio quality settings need a re-encoding audio codec', ['quality']);
  }

  profile.extraFlags.forEach((flag, index) => {
    if (RESERVED_FLAGS.has(flag)) {
      issue(`${flag} is managed by the queue`, ['extraFlags', index]);
    }
  });
});

/** What callers write: a plain object, possibly incomplete */
export type ProfileDefinition = z.input<typeof profileDefinitionSchema>;

export type ProfileQuality = z.output<typeof qualitySchema>;

type ParsedProfile = z.output<typeof profileDefinitionSchema>;

export type ProfileOverrides = Partial<Omit<ProfileDefinition, 'id' | 'videoCodec' | 'audioCodec'>> & {
  videoCodec?: string | null;   // null removes the codec
  audioCodec?: string | null;
};

/** Ordered encoder arguments */
export type ArgumentList = readonly string[];

export class ConversionProfile {
  readonly id: string;
  readonly label: string;
  readonly container: string;
  readonly videoCodec: string | null;
  readonly audioCodec: string | null;
  readonly quality: Readonly<ProfileQuality>;
  readonly extraFlags: readonly string[];

  private constructor(parsed: ParsedProfile) {
    this.id = parsed.id;
    this.label = parsed.label;
    this.container = parsed.container;
    this.videoCodec = parsed.videoCodec ?? null;
    this.audioCodec = parsed.audioCodec ?? null;
    this.quality = Object.freeze({ ...parsed.quality });
    this.extraFlags = Object.freeze([...parsed.extraFlags]);
    Object.freeze(this);
  }

  /**
   * Validate a definition and build a profile.
   * Throws InvalidProfileError listing every problem found.
   */
  static create(definition: unknown): ConversionProfile {
    const parsed = profileDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      const id = typeof definition === 'object'
        && definition !== null
        && 'id' in definition
        && typeof definition.id === 'string'
        ? definition.id
        : '';
      throw new InvalidProfileError(
        id,
        parsed.error.issues.map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      );
    }
    return new ConversionProfile(parsed.data);
  }

  get isAudioOnly(): boolean {
    return this.videoCodec === null;
  }

  toDefinition(): ProfileDefinition {
    return {
      id: this.id,
      label: this.label,
      container: this.container,
      ...(this.videoCodec !== null ? { videoCodec: this.videoCodec } : {}),
      ...(this.audioCodec !== null ? { audioCodec: this.audioCodec } : {}),
      quality: { ...this.quality },
      extraFlags: [...this.extraFlags],
    };
  }

  /**
   * Copy-on-customize: a new validated profile, this one untouched
   */
  customize(id: string, overrides: ProfileOverrides = {}): ConversionProfile {
    const base = this.toDefinition();
    const { videoCodec, audioCodec, quality, ...rest } = overrides;

    const merged: Record<string, unknown> = {
      ...base,
      ...rest,
      id,
      quality: { ...base.quality, ...quality },
    };

    if (videoCodec === null) delete merged['videoCodec'];
    else if (videoCodec !== undefined) merged['videoCodec'] = videoCodec;

    if (audioCodec === null) delete merged['audioCodec'];
    else if (audioCodec !== undefined) merged['audioCodec'] = audioCodec;

    return ConversionProfile.create(merged);
  }
}

/**
 * Apply a profile's codec and quality settings to a builder
 */
export function applyProfile(builder: FFmpegCommandBuilder, profile: ConversionProfile): FFmpegCommandBuilder {
  const { quality } = profile;

  if (profile.videoCodec === null) {
    builder.disableVideo();
  } else {
    builder.setVideoCodec({
      codec: profile.videoCodec,
      preset: quality.preset,
      crf: quality.crf,
      bitrate: quality.videoBitrate,
    });
    if (quality.scale) {
      builder.addVideoFilter(`scale=${quality.scale}`);
    }
  }

  if (profile.audioCodec === null) {
    builder.disableAudio();
  } else {
    builder.setAudioCodec({
      codec: profile.audioCodec,
      bitrate: quality.audioBitrate,
      sampleRate: quality.audioSampleRate,
      channels: quality.audioChannels,
    });
  }

  if (profile.extraFlags.length > 0) {
    builder.addTrailingArgs(...profile.extraFlags);
  }

  return builder;
}

/**
 * Render the codec/quality segment of the encoder arguments
 */
export function renderProfileArguments(profile: ConversionProfile): ArgumentList {
  return Object.freeze(applyProfile(new FFmpegCommandBuilder(), profile).buildEncodingArgs());
}
