import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import type { StreamSelector } from '@audex/core';
import type { MediaInspector } from '@audex/media';
import type { CommandOptions, CommandResult, CommandRunner } from '@audex/utils';

export function tmpDir(): string {
  return path.join(os.tmpdir(), `audex-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

export async function cleanup(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function touch(filePath: string, content = 'video'): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
}

export function commandResult(overrides: Partial<CommandResult> = {}): CommandResult {
  return {
    exitCode: 0,
    stdout: '',
    stderr: '',
    duration: 1,
    timedOut: false,
    ...overrides,
  };
}

/**
 * Inspector that answers from a fixed codec and records its calls
 */
export class StubInspector implements MediaInspector {
  calls: { filePath: string; stream: StreamSelector }[] = [];

  constructor(private codec: string | null) {}

  async detectAudioCodec(filePath: string, stream: StreamSelector): Promise<string | null> {
    this.calls.push({ filePath, stream });
    return this.codec;
  }
}

export interface RecordedCall {
  command: string;
  args: string[];
  options?: CommandOptions;
}

export type FakeHandler = (call: RecordedCall) => Promise<CommandResult> | CommandResult;

/**
 * In-process stand-in for ffmpeg and ffprobe.
 * By default ffprobe reports `aac` and ffmpeg writes its output file and exits 0.
 */
export function fakeTools(handlers: { ffmpeg?: FakeHandler; ffprobe?: FakeHandler } = {}): {
  runner: CommandRunner;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];

  const runner: CommandRunner = async (command, args, options) => {
    const call: RecordedCall = { command, args, options };
    calls.push(call);

    if (command === 'ffprobe') {
      return handlers.ffprobe ? handlers.ffprobe(call) : commandResult({ stdout: 'aac\n' });
    }
    if (command === 'ffmpeg') {
      if (handlers.ffmpeg) return handlers.ffmpeg(call);
      await writeOutput(call);
      return commandResult();
    }
    throw new Error(`spawn ${command} ENOENT`);
  };

  return { runner, calls };
}

/**
 * Write the file an ffmpeg call would produce (its last argument)
 */
export async function writeOutput(call: RecordedCall): Promise<void> {
  const output = call.args[call.args.length - 1];
  if (output === undefined) {
    throw new Error('ffmpeg called without arguments');
  }
  await fs.writeFile(output, 'audio');
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
