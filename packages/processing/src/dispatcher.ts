/**
 * Batch Dispatcher
 *
 * Runs one extraction task per input file on a fixed-size pool,
 * reports every outcome as it completes, and supports cooperative
 * cancellation: tasks not yet started report "Cancelled", ffmpeg
 * processes already running are left to finish.
 *
 * A listener that throws is logged and skipped; the batch carries on.
 *
 * Events:
 * - 'log'      (line: string)
 * - 'status'   (text: string)
 * - 'progress' (progress: BatchProgress)
 * - 'result'   (result: TaskResult)
 * - 'summary'  (summary: BatchSummary)
 */

import { EventEmitter } from 'node:events';
import { basename } from 'node:path';
import PQueue from 'p-queue';
import {
  BatchInProgressError,
  errorMessage,
  toStreamSpecifier,
  type BatchProgress,
  type BatchSummary,
  type JobConfiguration,
  type TaskResult,
} from '@audex/core';
import { FFProbe, type MediaInspector } from '@audex/media';
import {
  createLogger,
  executeCommand,
  formatCommand,
  type CommandRunner,
} from '@audex/utils';
import { buildExtractCommand } from './commandBuilder.js';
import { FFmpeg } from './ffmpeg.js';
import { resolveOutputPath } from './outputPath.js';
import type { InputFile } from './scanner.js';

const log = createLogger({ module: 'dispatcher' });

export const CANCELLED_MESSAGE = 'Cancelled';

export interface DispatcherEvents {
  log: [line: string];
  status: [text: string];
  progress: [progress: BatchProgress];
  result: [result: TaskResult];
  summary: [summary: BatchSummary];
}

export type DispatcherEventName = keyof DispatcherEvents;

/**
 * Run state of one batch. Created per run and handed to every task;
 * only the dispatcher mutates it.
 */
export interface BatchContext {
  readonly total: number;
  done: number;
  succeeded: number;
  failed: number;
  cancelled: boolean;
  readonly results: TaskResult[];
  readonly startedAt: number;
}

export function createBatchContext(total: number): BatchContext {
  return {
    total,
    done: 0,
    succeeded: 0,
    failed: 0,
    cancelled: false,
    results: [],
    startedAt: Date.now(),
  };
}

export interface DispatcherOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  runner?: CommandRunner;
  inspector?: MediaInspector;
}

export class BatchDispatcher extends EventEmitter {
  private ffmpeg: FFmpeg;
  private inspector: MediaInspector;
  private context: BatchContext | null = null;

  constructor(options: DispatcherOptions = {}) {
    super();
    const runner = options.runner ?? executeCommand;
    this.ffmpeg = new FFmpeg(options.ffmpegPath ?? 'ffmpeg', runner);
    this.inspector = options.inspector ?? new FFProbe(options.ffprobePath ?? 'ffprobe', runner);
  }

  /**
   * Whether a batch is currently running
   */
  get isRunning(): boolean {
    return this.context !== null;
  }

  /**
   * Process every file and resolve once all of them have a result
   */
  async run(files: readonly InputFile[], config: JobConfiguration): Promise<BatchSummary> {
    if (this.context) {
      throw new BatchInProgressError();
    }

    const context = createBatchContext(files.length);
    this.context = context;

    const workers = Math.max(1, config.workers);
    const queue = new PQueue({ concurrency: workers });

    log.info({
      total: files.length,
      workers,
      mode: config.mode,
      stream: toStreamSpecifier(config.stream),
      outputRoot: config.outputRoot,
    }, 'Starting batch');

    if (config.mode === 'COPY' && config.loudnorm) {
      log.warn('Loudness normalization needs re-encoding; ffmpeg will reject it in COPY mode');
    }

    this.publish('status', `Found ${files.length} file(s). Starting...`);

    try {
      await Promise.all(
        files.map((file) =>
          queue.add(async () => {
            const result = await this.processFile(file, config, context);
            this.record(context, result);
          })
        )
      );
    } finally {
      this.context = null;
    }

    const summary: BatchSummary = {
      total: context.total,
      completed: context.done,
      succeeded: context.succeeded,
      failed: context.failed,
      cancelled: context.cancelled,
      durationMs: Date.now() - context.startedAt,
      results: [...context.results],
    };

    const word = summary.cancelled ? 'Cancelled' : 'Done';
    this.publish('status', `${word}. OK: ${summary.succeeded}, Failed: ${summary.failed}`);
    this.publish('log', `== ${word} ==`);

    log.info({
      succeeded: summary.succeeded,
      failed: summary.failed,
      cancelled: summary.cancelled,
      durationMs: summary.durationMs,
    }, 'Batch finished');

    this.publish('summary', summary);
    return summary;
  }

  /**
   * Stop starting new tasks. Returns false when no batch is running.
   */
  cancel(): boolean {
    if (!this.context || this.context.cancelled) {
      return false;
    }

    log.info('Cancelling batch');
    this.context.cancelled = true;
    this.publish('status', 'Cancelling...');
    return true;
  }

  /**
   * One file, start to finish. Never throws: every fault becomes a failed result.
   */
  private async processFile(
    file: InputFile,
    config: JobConfiguration,
    context: BatchContext
  ): Promise<TaskResult> {
    const source = file.path;

    if (context.cancelled) {
      return { source, success: false, message: CANCELLED_MESSAGE };
    }

    try {
      const output = await resolveOutputPath({
        source,
        inputRoot: config.inputRoot,
        outputRoot: config.outputRoot,
        preserveTree: config.preserveTree,
        mode: config.mode,
        stream: config.stream,
      }, this.inspector);

      const args = buildExtractCommand({
        input: source,
        output,
        mode: config.mode,
        stream: config.stream,
        loudnorm: config.loudnorm,
        sampleRate: config.sampleRate,
        bitrate: config.bitrate,
        useGpu: config.useGpu,
      });

      log.debug({ source, command: formatCommand(this.ffmpeg.ffmpegPath, args) }, 'FFmpeg command');

      const run = await this.ffmpeg.execute(args, { timeout: config.timeoutMs });

      if (run.timedOut) {
        const seconds = Math.round((config.timeoutMs ?? 0) / 1000);
        return { source, success: false, message: `Timed out after ${seconds}s` };
      }

      if (run.exitCode !== 0) {
        const stderr = run.stderr.trim();
        return {
          source,
          success: false,
          message: stderr || `ffmpeg exited with code ${run.exitCode}`,
        };
      }

      return { source, success: true, message: output };
    } catch (error) {
      return { source, success: false, message: errorMessage(error) };
    }
  }

  /**
   * Fold a finished task into the run state and tell listeners about it
   */
  private record(context: BatchContext, result: TaskResult): void {
    context.done++;
    if (result.success) {
      context.succeeded++;
    } else {
      context.failed++;
      log.warn({ source: result.source, error: result.message }, 'Task failed');
    }
    context.results.push(result);

    const name = basename(result.source);
    this.publish('result', result);
    this.publish('progress', { done: context.done, total: context.total });
    this.publish(
      'log',
      result.success ? `[OK] ${name} -> ${result.message}` : `[FAIL] ${name} :: ${result.message}`
    );
    this.publish(
      'status',
      `Progress: ${context.done}/${context.total} | OK: ${context.succeeded} | Failed: ${context.failed}`
    );
  }

  /**
   * Listener faults are logged and never reach the batch
   */
  private publish<K extends DispatcherEventName>(event: K, ...args: DispatcherEvents[K]): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      log.warn({ event, error }, 'Event listener failed');
    }
  }
}
