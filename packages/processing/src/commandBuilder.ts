/**
 * FFmpeg Command Builder
 *
 * Fluent API for assembling encoder argument lists. Renders both the
 * profile segment and the full invocation.
 */

export interface VideoCodecOptions {
  codec: string;
  preset?: string;
  crf?: number;
  bitrate?: string;
}

export interface AudioCodecOptions {
  codec: string;
  bitrate?: string;
  sampleRate?: number;
  channels?: number;
}

export interface SubtitleOptions {
  codec: string;
}

type StreamKind = 'v' | 'a' | 's';

// null = stream type dropped (-vn / -an)
type CodecSetting<T> = T | null | undefined;

export class FFmpegCommandBuilder {
  private readonly globalArgs: string[] = [];
  private readonly inputs: string[] = [];
  private readonly maps: string[] = [];
  private readonly videoFilters: string[] = [];
  private readonly trailingArgs: string[] = [];
  private video: CodecSetting<VideoCodecOptions>;
  private audio: CodecSetting<AudioCodecOptions>;
  private subtitles: SubtitleOptions | undefined;
  private metadataFrom: number | undefined;
  private output = '';

  /**
   * Arguments placed before the first input
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  addInput(file: string): this {
    this.inputs.push(file);
    return this;
  }

  mapVideo(inputIndex = 0, streamIndex?: number, optional = true): this {
    return this.mapStream('v', inputIndex, streamIndex, optional);
  }

  mapAudio(inputIndex = 0, streamIndex?: number, optional = true): this {
    return this.mapStream('a', inputIndex, streamIndex, optional);
  }

  mapSubtitles(inputIndex = 0, streamIndex?: number, optional = true): this {
    return this.mapStream('s', inputIndex, streamIndex, optional);
  }

  setVideoCodec(options: VideoCodecOptions | 'copy'): this {
    this.video = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions | 'copy'): this {
    this.audio = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  setSubtitleCodec(options: SubtitleOptions | 'copy'): this {
    this.subtitles = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  disableVideo(): this {
    this.video = null;
    return this;
  }

  disableAudio(): this {
    this.audio = null;
    return this;
  }

  /**
   * Ignored when video is copied or dropped
   */
  addVideoFilter(filter: string): this {
    this.videoFilters.push(filter);
    return this;
  }

  /**
   * Arguments emitted right after the codec settings
   */
  addTrailingArgs(...args: string[]): this {
    this.trailingArgs.push(...args);
    return this;
  }

  copyMetadata(inputIndex = 0): this {
    this.metadataFrom = inputIndex;
    return this;
  }

  setOutput(file: string): this {
    this.output = file;
    return this;
  }

  /**
   * Codec, filter and trailing arguments only
   */
  buildEncodingArgs(): string[] {
    return [...this.videoArgs(), ...this.audioArgs(), ...this.trailingArgs];
  }

  build(): string[] {
    if (!this.output) {
      throw new Error('Output file not specified');
    }

    const args = [...this.globalArgs];
    for (const input of this.inputs) {
      args.push('-i', input);
    }
    for (const map of this.maps) {
      args.push('-map', map);
    }
    args.push(...this.buildEncodingArgs());
    if (this.subtitles) {
      args.push('-c:s', this.subtitles.codec);
    }
    if (this.metadataFrom !== undefined) {
      args.push('-map_metadata', String(this.metadataFrom));
    }
    args.push(this.output);

    return args;
  }

  private mapStream(kind: StreamKind, inputIndex: number, streamIndex: number | undefined, optional: boolean): this {
    const stream = streamIndex !== undefined ? `${kind}:${streamIndex}` : kind;
    this.maps.push(`${inputIndex}:${stream}${optional ? '?' : ''}`);
    return this;
  }

  private videoArgs(): string[] {
    const video = this.video;
    if (video === null) return ['-vn'];
    if (video === undefined) return [];
    if (video.codec === 'copy') return ['-c:v', 'copy'];

    const args = ['-c:v', video.codec];
    if (video.preset) args.push('-preset', video.preset);
    if (video.crf !== undefined) args.push('-crf', String(video.crf));
    if (video.bitrate) args.push('-b:v', video.bitrate);
    if (this.videoFilters.length > 0) args.push('-vf', this.videoFilters.join(','));
    return args;
  }

  private audioArgs(): string[] {
    const audio = this.audio;
    if (audio === null) return ['-an'];
    if (audio === undefined) return [];
    if (audio.codec === 'copy') return ['-c:a', 'copy'];

    const args = ['-c:a', audio.codec];
    if (audio.bitrate) args.push('-b:a', audio.bitrate);
    if (audio.sampleRate) args.push('-ar', String(audio.sampleRate));
    if (audio.channels) args.push('-ac', String(audio.channels));
    return args;
  }
}
