/**
 * @audex/processing
 * 
 * Batch audio extraction over ffmpeg.
 * 
 * RULES:
 * - Exactly one audio stream per output, never video or subtitles
 * - Stream copy in COPY mode, no re-encode
 * - One result per input file, whatever happens to it
 * - Log every FFmpeg command executed
 */

// FFmpeg wrapper
export { FFmpeg, type FFmpegRunResult } from './ffmpeg.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  createExtractCommand,
  buildExtractCommand,
  audioCodecFor,
  LOUDNORM_FILTER,
  AAC_DEFAULT_QUALITY,
  type AudioCodecOptions,
  type ExtractCommandOptions,
  type ExcludedStream,
  type InputOptions,
  type StreamMapping,
} from './commandBuilder.js';

// Output paths
export {
  resolveOutputPath,
  outputStem,
  outputExtension,
  pickCopyExtension,
  COPY_EXTENSIONS,
  DEFAULT_COPY_EXTENSION,
  type OutputPathOptions,
} from './outputPath.js';

// Scanner
export {
  scanVideoFiles,
  isVideoFile,
  VIDEO_EXTENSIONS,
  type InputFile,
} from './scanner.js';

// Dispatcher
export {
  BatchDispatcher,
  createBatchContext,
  CANCELLED_MESSAGE,
  type BatchContext,
  type DispatcherEvents,
  type DispatcherEventName,
  type DispatcherOptions,
} from './dispatcher.js';

// Batch preparation
export { prepareBatch, type PrepareOptions, type PreparedBatch } from './batch.js';

// Presets
export {
  MUSIC_GPU_PRESET,
  ALL_PRESETS,
  getPreset,
  applyPreset,
  type ExtractionPreset,
  type PresetOptions,
} from './presets.js';
