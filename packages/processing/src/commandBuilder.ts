/**
 * FFmpeg Command Builder
 * 
 * Fluent API for building audio extraction commands, plus the
 * mode table that turns a job into one.
 * 
 * Output never carries video, subtitle or data streams.
 */

import {
  toStreamSpecifier,
  type StreamSelector,
  type TranscodeMode,
} from '@audex/core';
import { formatCommand } from '@audex/utils';

export interface InputOptions {
  hwaccel?: 'cuda' | 'qsv' | 'videotoolbox' | 'vaapi'; // -hwaccel
}

export interface StreamMapping {
  inputIndex: number;
  streamSpec: string;     // e.g. 'a:0', 'a:m:language:eng'
  optional?: boolean;     // Add ? for optional
}

export interface AudioCodecOptions {
  codec: 'copy' | 'aac' | 'libmp3lame' | 'pcm_s16le';
  bitrate?: string;       // -b:a, e.g. '192k'
  quality?: number;       // -q:a, encoder VBR tier
  channels?: number;      // -ac
  sampleRate?: number;    // -ar
}

export type ExcludedStream = 'video' | 'subtitle' | 'data';

const EXCLUDE_FLAGS: Record<ExcludedStream, string> = {
  video: '-vn',
  subtitle: '-sn',
  data: '-dn',
};

/**
 * EBU R128 normalization: -16 LUFS integrated, -1.5 dBTP true peak, 11 LU range
 */
export const LOUDNORM_FILTER = 'loudnorm=I=-16:TP=-1.5:LRA=11';

// Tier used by the native AAC encoder when no bitrate is given
export const AAC_DEFAULT_QUALITY = 2;

export class FFmpegCommandBuilder {
  private inputs: { file: string; options: InputOptions }[] = [];
  private excluded: ExcludedStream[] = [];
  private mappings: StreamMapping[] = [];
  private audioCodec: AudioCodecOptions | null = null;
  private audioFilters: string[] = [];
  private outputFile: string = '';
  private globalArgs: string[] = [];

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Overwrite the output file without asking
   */
  overwrite(): this {
    return this.addGlobalArg('-y');
  }

  /**
   * Add input file
   */
  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Drop whole stream kinds from the output
   */
  exclude(...kinds: ExcludedStream[]): this {
    for (const kind of kinds) {
      if (!this.excluded.includes(kind)) this.excluded.push(kind);
    }
    return this;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string, optional: boolean = false): this {
    this.mappings.push({ inputIndex, streamSpec, optional });
    return this;
  }

  /**
   * Map exactly the selected audio stream
   */
  mapAudio(inputIndex: number, selector: StreamSelector): this {
    return this.map(inputIndex, toStreamSpecifier(selector));
  }

  /**
   * Set audio codec (copy = no re-encode)
   */
  setAudioCodec(options: AudioCodecOptions | 'copy'): this {
    this.audioCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  /**
   * Add audio filter
   */
  addAudioFilter(filter: string): this {
    this.audioFilters.push(filter);
    return this;
  }

  /**
   * Add loudnorm filter for audio normalization
   */
  addLoudnessNorm(): this {
    return this.addAudioFilter(LOUDNORM_FILTER);
  }

  /**
   * Set output file
   */
  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    // Global args
    args.push(...this.globalArgs);

    // Inputs
    for (const input of this.inputs) {
      if (input.options.hwaccel) {
        args.push('-hwaccel', input.options.hwaccel);
      }
      args.push('-i', input.file);
    }

    // Stream kinds dropped from the output
    for (const kind of this.excluded) {
      args.push(EXCLUDE_FLAGS[kind]);
    }

    // Mappings
    for (const mapping of this.mappings) {
      const opt = mapping.optional ? '?' : '';
      args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}${opt}`);
    }

    // Audio codec
    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);

      if (this.audioCodec.codec !== 'copy') {
        if (this.audioCodec.bitrate) args.push('-b:a', this.audioCodec.bitrate);
        if (this.audioCodec.quality !== undefined) args.push('-q:a', this.audioCodec.quality.toString());
        if (this.audioCodec.channels) args.push('-ac', this.audioCodec.channels.toString());
        if (this.audioCodec.sampleRate) args.push('-ar', this.audioCodec.sampleRate.toString());
      }
    }

    // Audio filters. ffmpeg rejects these together with stream copy,
    // which surfaces as a failed file rather than being dropped here.
    if (this.audioFilters.length > 0) {
      args.push('-af', this.audioFilters.join(','));
    }

    // Output file
    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }

  /**
   * Build command as string for logging
   */
  buildString(ffmpegPath: string = 'ffmpeg'): string {
    return formatCommand(ffmpegPath, this.build());
  }
}

export interface ExtractCommandOptions {
  input: string;
  output: string;
  mode: TranscodeMode;
  stream: StreamSelector;
  loudnorm: boolean;
  sampleRate?: number;    // Hz
  bitrate?: number;       // kbps
  useGpu?: boolean;
}

/**
 * Codec settings for each transcoding mode
 */
export function audioCodecFor(
  mode: TranscodeMode,
  sampleRate?: number,
  bitrate?: number
): AudioCodecOptions {
  const kbps = bitrate ? `${bitrate}k` : undefined;

  switch (mode) {
    case 'COPY':
      return { codec: 'copy' };
    case 'MP3':
      return { codec: 'libmp3lame', bitrate: kbps, sampleRate };
    case 'AAC':
      return {
        codec: 'aac',
        bitrate: kbps,
        quality: kbps ? undefined : AAC_DEFAULT_QUALITY,
        sampleRate,
      };
    case 'WAV':
      return { codec: 'pcm_s16le', channels: 2, sampleRate };
  }
}

/**
 * Create the builder for one extraction
 */
export function createExtractCommand(options: ExtractCommandOptions): FFmpegCommandBuilder {
  const builder = new FFmpegCommandBuilder()
    .overwrite()
    .addInput(options.input, options.useGpu ? { hwaccel: 'cuda' } : {})
    .exclude('video', 'subtitle', 'data')
    .mapAudio(0, options.stream)
    .setAudioCodec(audioCodecFor(options.mode, options.sampleRate, options.bitrate))
    .setOutput(options.output);

  if (options.loudnorm) {
    builder.addLoudnessNorm();
  }

  return builder;
}

/**
 * ffmpeg arguments (without the program name) for one extraction
 */
export function buildExtractCommand(options: ExtractCommandOptions): string[] {
  return createExtractCommand(options).build();
}
