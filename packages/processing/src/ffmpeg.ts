/**
 * FFmpeg Wrapper
 * 
 * Runs one ffmpeg invocation and reports how it ended.
 */

import { executeCommand, type CommandRunner } from '@audex/utils';

export interface FFmpegRunResult {
  exitCode: number;
  stderr: string;
  timedOut: boolean;
  duration: number;
}

export class FFmpeg {
  readonly ffmpegPath: string;
  private runner: CommandRunner;

  constructor(ffmpegPath: string = 'ffmpeg', runner: CommandRunner = executeCommand) {
    this.ffmpegPath = ffmpegPath;
    this.runner = runner;
  }

  /**
   * Execute an FFmpeg command and wait for the process to exit.
   * A timeout of 0 or undefined waits forever.
   */
  async execute(
    args: string[],
    options: { timeout?: number } = {}
  ): Promise<FFmpegRunResult> {
    // Detached so that Ctrl+C cancels the batch without killing running encodes
    const result = await this.runner(this.ffmpegPath, args, {
      timeout: options.timeout,
      detached: true,
    });

    return {
      exitCode: result.exitCode,
      stderr: result.stderr,
      timedOut: result.timedOut,
      duration: result.duration,
    };
  }
}
