/**
 * Extraction Presets
 * 
 * Named option bundles applied on top of a job's options.
 * Values from the preset win over what the caller passed.
 */

import { defaultWorkerCount, type JobConfigurationInput } from '@audex/core';

export type PresetOptions = Omit<JobConfigurationInput, 'inputRoot' | 'outputRoot'>;

export interface ExtractionPreset {
  name: string;
  description: string;
  options: () => PresetOptions;
}

/**
 * Music: MP3 320k at 44.1 kHz, normalized, decoded on the GPU
 */
export const MUSIC_GPU_PRESET: ExtractionPreset = {
  name: 'music-gpu',
  description: 'MP3 320 kbps, 44.1 kHz, loudness normalized, CUDA decoding, first audio track',
  options: () => ({
    mode: 'MP3',
    loudnorm: true,
    bitrate: 320,
    sampleRate: 44100,
    useGpu: true,
    // Machine default, clamped to 4..6
    workers: Math.min(6, Math.max(4, defaultWorkerCount())),
    recursive: false,
    stream: { kind: 'index', index: 0 },
  }),
};

export const ALL_PRESETS: Record<string, ExtractionPreset> = {
  [MUSIC_GPU_PRESET.name]: MUSIC_GPU_PRESET,
};

/**
 * Get a preset by name
 */
export function getPreset(name: string): ExtractionPreset | undefined {
  return Object.hasOwn(ALL_PRESETS, name) ? ALL_PRESETS[name] : undefined;
}

/**
 * Overlay a preset on raw job options
 */
export function applyPreset(
  preset: ExtractionPreset,
  input: JobConfigurationInput
): JobConfigurationInput {
  return { ...input, ...preset.options() };
}
