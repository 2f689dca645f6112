import { describe, it, expect } from 'vitest';
import type { CommandResult, CommandRunner } from '@audex/utils';
import { getBinariesConfig, isBinaryAvailable, verifyTools } from '../config/binaries.js';
import { AudexError, ToolNotFoundError } from '../errors/index.js';

function result(exitCode: number): CommandResult {
  return { exitCode, stdout: '', stderr: '', duration: 1, timedOut: false };
}

describe('getBinariesConfig', () => {
  it('uses bare names without overrides', () => {
    const config = getBinariesConfig({});

    expect(config.ffmpeg).toEqual({ name: 'ffmpeg', envVar: 'FFMPEG_PATH', resolvedPath: 'ffmpeg' });
    expect(config.ffprobe).toEqual({ name: 'ffprobe', envVar: 'FFPROBE_PATH', resolvedPath: 'ffprobe' });
  });

  it('prefers environment overrides', () => {
    const config = getBinariesConfig({
      FFMPEG_PATH: ' /opt/ffmpeg/bin/ffmpeg ',
      FFPROBE_PATH: '/opt/ffmpeg/bin/ffprobe',
    });

    expect(config.ffmpeg.resolvedPath).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(config.ffprobe.resolvedPath).toBe('/opt/ffmpeg/bin/ffprobe');
  });

  it('ignores blank overrides', () => {
    expect(getBinariesConfig({ FFMPEG_PATH: '  ' }).ffmpeg.resolvedPath).toBe('ffmpeg');
  });
});

describe('isBinaryAvailable', () => {
  it('runs -version with a short timeout', async () => {
    const seen: unknown[] = [];
    const runner: CommandRunner = async (command, args, options) => {
      seen.push([command, args, options]);
      return result(0);
    };

    expect(await isBinaryAvailable('ffmpeg', runner)).toBe(true);
    expect(seen).toEqual([['ffmpeg', ['-version'], { timeout: 5000 }]]);
  });

  it('is false on a non-zero exit or a spawn error', async () => {
    expect(await isBinaryAvailable('ffmpeg', async () => result(1))).toBe(false);
    expect(
      await isBinaryAvailable('ffmpeg', async () => {
        throw new Error('spawn ffmpeg ENOENT');
      })
    ).toBe(false);
  });
});

describe('verifyTools', () => {
  const config = getBinariesConfig({ FFPROBE_PATH: '/custom/ffprobe' });

  it('passes when both tools run', async () => {
    await expect(verifyTools(config, async () => result(0))).resolves.toBeUndefined();
  });

  it('names the first missing tool', async () => {
    const runner: CommandRunner = async (command) => {
      if (command === 'ffmpeg') return result(0);
      throw new Error(`spawn ${command} ENOENT`);
    };

    const attempt = verifyTools(config, runner);

    await expect(attempt).rejects.toBeInstanceOf(ToolNotFoundError);
    await expect(attempt).rejects.toBeInstanceOf(AudexError);
    await expect(attempt).rejects.toMatchObject({
      code: 'TOOL_NOT_FOUND',
      details: { tool: 'ffprobe', resolvedPath: '/custom/ffprobe' },
    });
  });

  it('checks ffmpeg before ffprobe', async () => {
    const checked: string[] = [];
    const runner: CommandRunner = async (command) => {
      checked.push(command);
      return result(127);
    };

    await expect(verifyTools(config, runner)).rejects.toThrow('ffmpeg not found (tried "ffmpeg")');
    expect(checked).toEqual(['ffmpeg']);
  });
});
