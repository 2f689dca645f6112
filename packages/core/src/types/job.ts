/**
 * Job Types
 * 
 * The job configuration handed to the dispatcher, plus the per-file
 * and per-batch outcome records it produces.
 */

import { availableParallelism } from 'node:os';
import { z } from 'zod';

export const TRANSCODE_MODES = ['COPY', 'MP3', 'AAC', 'WAV'] as const;

export type TranscodeMode = (typeof TRANSCODE_MODES)[number];

/**
 * Audio stream selection: by zero-based audio index or by ISO 639-2 language tag
 */
export type StreamSelector =
  | { kind: 'index'; index: number }
  | { kind: 'language'; language: string };

/**
 * Default pool size: half the cores, at least 2
 */
export function defaultWorkerCount(): number {
  return Math.max(2, Math.floor(availableParallelism() / 2));
}

export const streamSelectorSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('index'),
    index: z.number().int().min(0),
  }),
  z.object({
    kind: z.literal('language'),
    language: z
      .string()
      .trim()
      .regex(/^[a-zA-Z]{3}$/, 'must be a three-letter ISO 639-2 code')
      .transform((code) => code.toLowerCase()),
  }),
]);

export const jobConfigurationSchema = z.object({
  inputRoot: z.string().min(1),
  outputRoot: z.string().min(1),
  recursive: z.boolean().default(false),
  preserveTree: z.boolean().default(true),
  mode: z.enum(TRANSCODE_MODES).default('COPY'),
  stream: streamSelectorSchema.default({ kind: 'index', index: 0 }),
  loudnorm: z.boolean().default(false),
  sampleRate: z.number().int().positive().optional(),
  bitrate: z.number().int().positive().optional(),
  useGpu: z.boolean().default(false),
  workers: z.number().int().positive().default(defaultWorkerCount),
  timeoutMs: z.number().int().nonnegative().optional(),
});

export type JobConfigurationInput = z.input<typeof jobConfigurationSchema>;

export type JobConfiguration = Readonly<z.output<typeof jobConfigurationSchema>>;

/**
 * Outcome of one input file. `message` is the output path on success,
 * the error or diagnostic text on failure.
 */
export interface TaskResult {
  source: string;
  success: boolean;
  message: string;
}

export interface BatchProgress {
  done: number;
  total: number;
}

export interface BatchSummary {
  total: number;
  completed: number;
  succeeded: number;
  failed: number;
  cancelled: boolean;
  durationMs: number;
  results: TaskResult[];
}

/**
 * Render a selector the way ffmpeg and ffprobe take it (`a:0`, `a:m:language:eng`)
 */
export function toStreamSpecifier(selector: StreamSelector): string {
  switch (selector.kind) {
    case 'index':
      return `a:${selector.index}`;
    case 'language':
      return `a:m:language:${selector.language}`;
  }
}
