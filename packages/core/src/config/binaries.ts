/**
 * Binary Configuration
 * 
 * Centralized configuration for the external binaries audex drives.
 * 
 * Priority order:
 * 1. Environment variables (FFMPEG_PATH, FFPROBE_PATH)
 * 2. System PATH
 */

import { executeCommand, logger, type CommandRunner } from '@audex/utils';
import { ToolNotFoundError } from '../errors/index.js';

/**
 * Binary configuration interface
 */
export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
}

/**
 * All supported binaries
 */
export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
}

export type BinaryName = keyof BinariesConfig;

/**
 * Resolve binary path: a non-empty environment variable wins,
 * otherwise the bare name is left for PATH lookup at spawn time
 */
function resolveBinaryPath(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv
): BinaryConfig {
  const envPath = env[envVar]?.trim();
  return {
    name,
    envVar,
    resolvedPath: envPath ? envPath : name,
  };
}

/**
 * Get all binary configurations
 */
export function getBinariesConfig(env: NodeJS.ProcessEnv = process.env): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', env),
    ffprobe: resolveBinaryPath('ffprobe', 'FFPROBE_PATH', env),
  };
}

// Singleton instance
let _binaries: BinariesConfig | null = null;

/**
 * Get binary configurations (cached)
 */
export function binaries(): BinariesConfig {
  if (!_binaries) {
    _binaries = getBinariesConfig();
  }
  return _binaries;
}

/**
 * Check if a binary runs and exits cleanly on `-version`
 */
export async function isBinaryAvailable(
  binaryPath: string,
  runner: CommandRunner = executeCommand
): Promise<boolean> {
  try {
    const result = await runner(binaryPath, ['-version'], { timeout: 5000 });
    return result.exitCode === 0;
  } catch (error) {
    logger.debug({ binaryPath, error }, 'Binary could not be spawned');
    return false;
  }
}

/**
 * Verify ffmpeg and ffprobe once before a batch.
 * Throws ToolNotFoundError for the first one missing.
 */
export async function verifyTools(
  config: BinariesConfig = binaries(),
  runner: CommandRunner = executeCommand
): Promise<void> {
  for (const binary of [config.ffmpeg, config.ffprobe]) {
    if (!(await isBinaryAvailable(binary.resolvedPath, runner))) {
      throw new ToolNotFoundError(binary.name, binary.resolvedPath);
    }
    logger.debug({ tool: binary.name, path: binary.resolvedPath }, 'Tool available');
  }
}
