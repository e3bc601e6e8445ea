/**
 * Profile Catalog
 *
 * Named conversion profiles plus rendering into encoder arguments.
 * Built-in presets are read from data/presets.json.
 */

import { readFileSync } from 'node:fs';
import { InvalidProfileError, UnknownProfileError } from '@encodeq/core';
import { FFmpegCommandBuilder } from './commandBuilder.js';
import {
  ConversionProfile,
  applyProfile,
  renderProfileArguments,
  type ArgumentList,
  type ProfileDefinition,
  type ProfileOverrides,
} from './profile.js';

const PRESETS_FILE = new URL('../data/presets.json', import.meta.url);

/**
 * Read the built-in preset definitions
 */
export function loadBuiltinPresets(file: URL | string = PRESETS_FILE): unknown[] {
  const parsed: unknown = JSON.parse(readFileSync(file, 'utf8'));
  if (!Array.isArray(parsed)) {
    throw new InvalidProfileError('', [`preset file ${String(file)} must contain an array`]);
  }
  return parsed;
}

export type ProfileInput = string | ConversionProfile | ProfileDefinition;

export class ProfileCatalog {
  private readonly profiles = new Map<string, ConversionProfile>();

  constructor(definitions: readonly unknown[] = []) {
    for (const definition of definitions) {
      this.register(ConversionProfile.create(definition));
    }
  }

  /**
   * Catalog pre-filled with the shipped presets
   */
  static withBuiltins(): ProfileCatalog {
    return new ProfileCatalog(loadBuiltinPresets());
  }

  /**
   * Add a profile. Ids are unique unless `replace` is set.
   */
  register(
    profile: ConversionProfile | ProfileDefinition,
    options: { replace?: boolean } = {}
  ): ConversionProfile {
    const created = profile instanceof ConversionProfile ? profile : ConversionProfile.create(profile);
    if (this.profiles.has(created.id) && !options.replace) {
      throw new InvalidProfileError(created.id, ['a profile with this id is already registered']);
    }
    this.profiles.set(created.id, created);
    return created;
  }

  get(id: string): ConversionProfile {
    const profile = this.profiles.get(id);
    if (!profile) {
      throw new UnknownProfileError(id);
    }
    return profile;
  }

  find(id: string): ConversionProfile | undefined {
    return this.profiles.get(id);
  }

  has(id: string): boolean {
    return this.profiles.has(id);
  }

  list(): ConversionProfile[] {
    return Array.from(this.profiles.values());
  }

  /**
   * Derive and register a new profile from an existing one
   */
  customize(baseId: string, newId: string, overrides: ProfileOverrides = {}): ConversionProfile {
    return this.register(this.get(baseId).customize(newId, overrides));
  }

  /**
   * Turn an id, a definition or a profile into a validated profile
   */
  toProfile(input: ProfileInput): ConversionProfile {
    if (typeof input === 'string') return this.get(input);
    if (input instanceof ConversionProfile) return input;
    return ConversionProfile.create(input);
  }

  /**
   * Render a profile into its codec/quality argument segment.
   * Ids and raw definitions are looked up or validated first.
   */
  resolve(profile: ProfileInput): ArgumentList {
    return renderProfileArguments(this.toProfile(profile));
  }
}

export interface ConversionCommandOptions {
  overwrite?: boolean;
  includeSubtitles?: boolean;
}

// Containers whose subtitle streams must be converted rather than copied
const SUBTITLE_CODEC_BY_CONTAINER: Record<string, string> = {
  mp4: 'mov_text',
  m4v: 'mov_text',
  mov: 'mov_text',
  webm: 'webvtt',
};

/**
 * Full encoder invocation for one conversion
 */
export function buildConversionCommand(
  profile: ConversionProfile,
  source: string,
  destination: string,
  options: ConversionCommandOptions = {}
): string[] {
  const builder = new FFmpegCommandBuilder()
    .addGlobalArg('-hide_banner', '-nostdin')
    .addGlobalArg(options.overwrite ? '-y' : '-n')
    .addInput(source);

  if (!profile.isAudioOnly) {
    builder.mapVideo(0);
  }
  if (profile.audioCodec !== null) {
    builder.mapAudio(0);
  }

  applyProfile(builder, profile);

  if (options.includeSubtitles && !profile.isAudioOnly) {
    builder
      .mapSubtitles(0)
      .setSubtitleCodec({ codec: SUBTITLE_CODEC_BY_CONTAINER[profile.container] ?? 'copy' });
  }

  return builder
    .copyMetadata(0)
    .setOutput(destination)
    .build();
}
