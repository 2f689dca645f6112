/**
 * Batch Preparation
 * 
 * Precondition checks that must pass before any file is touched.
 */

import { resolve } from 'node:path';
import {
  InputDirectoryError,
  binaries,
  verifyTools,
  type BinariesConfig,
  type JobConfiguration,
} from '@audex/core';
import { createLogger, ensureDir, executeCommand, isDirectory, type CommandRunner } from '@audex/utils';
import { scanVideoFiles, type InputFile } from './scanner.js';

const log = createLogger({ module: 'batch' });

export interface PrepareOptions {
  binaries?: BinariesConfig;
  runner?: CommandRunner;
}

export interface PreparedBatch {
  config: JobConfiguration;
  files: InputFile[];
}

/**
 * Verify the tools and the input folder, create the output root
 * and collect the input files. Any failure here is fatal for the batch.
 * 
 * Input and output roots are resolved to absolute paths.
 */
export async function prepareBatch(
  config: JobConfiguration,
  options: PrepareOptions = {}
): Promise<PreparedBatch> {
  await verifyTools(options.binaries ?? binaries(), options.runner ?? executeCommand);

  const inputRoot = resolve(config.inputRoot);
  const outputRoot = resolve(config.outputRoot);

  if (!(await isDirectory(inputRoot))) {
    throw new InputDirectoryError(inputRoot);
  }
  await ensureDir(outputRoot);

  const files = await scanVideoFiles(inputRoot, config.recursive);
  log.info({ inputRoot, recursive: config.recursive, found: files.length }, 'Scanned input folder');

  return {
    config: Object.freeze({ ...config, inputRoot, outputRoot }),
    files,
  };
}
