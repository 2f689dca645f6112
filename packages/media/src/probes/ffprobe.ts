/**
 * FFProbe Wrapper
 * 
 * Queries the codec of a single selected audio stream.
 */

import { toStreamSpecifier, type StreamSelector } from '@audex/core';
import {
  createLogger,
  executeCommand,
  type CommandResult,
  type CommandRunner,
} from '@audex/utils';

const log = createLogger({ module: 'ffprobe' });

/**
 * What the output path resolver needs from a prober
 */
export interface MediaInspector {
  detectAudioCodec(filePath: string, stream: StreamSelector): Promise<string | null>;
}

export class FFProbe implements MediaInspector {
  private ffprobePath: string;
  private runner: CommandRunner;

  constructor(ffprobePath: string = 'ffprobe', runner: CommandRunner = executeCommand) {
    this.ffprobePath = ffprobePath;
    this.runner = runner;
  }

  /**
   * Codec name of the selected audio stream, e.g. `aac` or `eac3`.
   * 
   * Returns null when ffprobe fails, prints nothing, or cannot be spawned;
   * callers pick their own fallback. Waits as long as ffprobe runs.
   */
  async detectAudioCodec(filePath: string, stream: StreamSelector): Promise<string | null> {
    const args = [
      '-v', 'error',
      '-select_streams', toStreamSpecifier(stream),
      '-show_entries', 'stream=codec_name',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      filePath,
    ];

    let result: CommandResult;
    try {
      result = await this.runner(this.ffprobePath, args, { detached: true });
    } catch (error) {
      log.warn({ filePath, error }, 'ffprobe could not be started');
      return null;
    }

    if (result.exitCode !== 0) {
      log.debug({ filePath, exitCode: result.exitCode, stderr: result.stderr.trim() }, 'ffprobe failed');
      return null;
    }

    const codec = result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find((line) => line.length > 0);

    return codec ?? null;
  }
}
