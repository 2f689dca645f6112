/**
 * Check Command
 * 
 * Verify that ffmpeg and ffprobe can be run.
 */

import ora from 'ora';
import { errorMessage, getBinariesConfig, verifyTools } from '@audex/core';
import { printError, printKeyValue } from '../lib/output.js';

export async function checkCommand(): Promise<void> {
  const binaries = getBinariesConfig();
  const spinner = ora('Checking ffmpeg and ffprobe...').start();

  try {
    await verifyTools(binaries);
    spinner.succeed('ffmpeg and ffprobe are available');

    for (const binary of [binaries.ffmpeg, binaries.ffprobe]) {
      printKeyValue(binary.name, `${binary.resolvedPath} (override with ${binary.envVar})`);
    }
  } catch (error) {
    spinner.fail('Tool check failed');
    printError(errorMessage(error));
    process.exit(1);
  }
}
