/**
 * Extract Options
 * 
 * Turns commander's raw option values into job configuration input.
 * Range and shape checks stay with jobConfigurationSchema.
 */

import { ValidationError, type JobConfigurationInput, type StreamSelector } from '@audex/core';
import { applyPreset, getPreset, ALL_PRESETS } from '@audex/processing';
import type { CliConfig } from '../config/index.js';

export interface ExtractOptions {
  output?: string;
  recursive?: boolean;
  flat?: boolean;
  mode?: string;
  index?: string;
  language?: string;
  loudnorm?: boolean;
  sampleRate?: string;
  bitrate?: string;
  gpu?: boolean;
  workers?: string;
  timeout?: string;
  preset?: string;
}

const DEFAULT_LANGUAGE = 'eng';

/**
 * Parse a whole, non-negative number given on the command line
 */
export function parseIntegerOption(value: string | undefined, field: string): number | undefined {
  if (value === undefined) return undefined;

  const trimmed = value.trim();
  if (trimmed === '') return undefined;
  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError(field, `must be a whole number, got "${value}"`);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Index and language are exclusive; neither means audio index 0
 */
export function parseStreamSelector(options: Pick<ExtractOptions, 'index' | 'language'>): StreamSelector {
  if (options.index !== undefined && options.language !== undefined) {
    throw new ValidationError('stream', 'use either --index or --language, not both');
  }

  if (options.language !== undefined) {
    return { kind: 'language', language: options.language.trim() || DEFAULT_LANGUAGE };
  }

  return { kind: 'index', index: parseIntegerOption(options.index, 'index') ?? 0 };
}

/**
 * Build raw job input from the positional input folder and flags
 */
export function buildJobInput(
  inputRoot: string,
  options: ExtractOptions,
  config: CliConfig
): JobConfigurationInput {
  const timeoutSeconds = parseIntegerOption(options.timeout, 'timeout');

  const input: JobConfigurationInput = {
    inputRoot,
    outputRoot: options.output ?? config.defaultOutputDir,
    recursive: options.recursive ?? false,
    preserveTree: !options.flat,
    mode: parseMode(options.mode),
    stream: parseStreamSelector(options),
    loudnorm: options.loudnorm ?? false,
    sampleRate: parseIntegerOption(options.sampleRate, 'sampleRate'),
    bitrate: parseIntegerOption(options.bitrate, 'bitrate'),
    useGpu: options.gpu ?? false,
    workers: parseIntegerOption(options.workers, 'workers') ?? config.defaultWorkers,
    timeoutMs: timeoutSeconds !== undefined ? timeoutSeconds * 1000 : undefined,
  };

  if (options.preset === undefined) {
    return input;
  }

  const preset = getPreset(options.preset);
  if (!preset) {
    const known = Object.keys(ALL_PRESETS).join(', ');
    throw new ValidationError('preset', `unknown preset "${options.preset}" (available: ${known})`);
  }
  return applyPreset(preset, input);
}

function parseMode(mode: string | undefined): JobConfigurationInput['mode'] {
  switch (mode?.toUpperCase()) {
    case undefined:
    case 'COPY':
      return 'COPY';
    case 'MP3':
      return 'MP3';
    case 'AAC':
      return 'AAC';
    case 'WAV':
      return 'WAV';
    default:
      throw new ValidationError('mode', `expected copy, mp3, aac or wav, got "${mode}"`);
  }
}
