/**
 * Output Path Resolution
 * 
 * Maps an input video to the audio file written for it under the output root.
 */

import { join, relative, isAbsolute, sep } from 'node:path';
import type { StreamSelector, TranscodeMode } from '@audex/core';
import type { MediaInspector } from '@audex/media';
import { ensureParentDir, getBasename, stripExtension } from '@audex/utils';

/**
 * Container extension for a stream-copied codec
 */
export const COPY_EXTENSIONS: Readonly<Record<string, string>> = {
  aac: '.m4a',
  mp3: '.mp3',
  ac3: '.ac3',
  eac3: '.eac3',
  dts: '.dts',
  opus: '.opus',
  vorbis: '.ogg',
  flac: '.flac',
  pcm_s16le: '.wav',
  truehd: '.thd',
};

// Unknown or undetected codecs land in an AAC container
export const DEFAULT_COPY_EXTENSION = '.m4a';

const MODE_EXTENSIONS: Record<Exclude<TranscodeMode, 'COPY'>, string> = {
  MP3: '.mp3',
  AAC: '.m4a',
  WAV: '.wav',
};

export function pickCopyExtension(codec: string | null | undefined): string {
  if (codec && Object.hasOwn(COPY_EXTENSIONS, codec)) {
    return COPY_EXTENSIONS[codec] ?? DEFAULT_COPY_EXTENSION;
  }
  return DEFAULT_COPY_EXTENSION;
}

export interface OutputPathOptions {
  source: string;
  inputRoot: string;
  outputRoot: string;
  preserveTree: boolean;
  mode: TranscodeMode;
  stream: StreamSelector;
}

/**
 * Output path without extension: mirrored relative path, or bare stem when flattening
 */
export function outputStem(source: string, inputRoot: string, preserveTree: boolean): string {
  if (!preserveTree) {
    return getBasename(source);
  }

  const rel = relative(inputRoot, source);
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new Error(`${source} is not inside input folder ${inputRoot}`);
  }
  return stripExtension(rel);
}

/**
 * Extension for a mode; COPY asks the inspector which codec it is copying
 */
export async function outputExtension(
  source: string,
  mode: TranscodeMode,
  stream: StreamSelector,
  inspector: MediaInspector
): Promise<string> {
  if (mode === 'COPY') {
    const codec = await inspector.detectAudioCodec(source, stream);
    return pickCopyExtension(codec);
  }
  return MODE_EXTENSIONS[mode];
}

/**
 * Resolve the output file for one input and create its parent directory
 */
export async function resolveOutputPath(
  options: OutputPathOptions,
  inspector: MediaInspector
): Promise<string> {
  const stem = outputStem(options.source, options.inputRoot, options.preserveTree);
  const ext = await outputExtension(options.source, options.mode, options.stream, inspector);

  const outputPath = join(options.outputRoot, stem + ext);
  await ensureParentDir(outputPath);
  return outputPath;
}

