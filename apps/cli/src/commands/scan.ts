/**
 * Scan Command
 * 
 * List the video files an extraction would pick up.
 */

import { resolve, relative } from 'node:path';
import { errorMessage, InputDirectoryError } from '@audex/core';
import { scanVideoFiles } from '@audex/processing';
import { isDirectory } from '@audex/utils';
import { printError, printInfo } from '../lib/output.js';

interface ScanOptions {
  recursive?: boolean;
}

export async function scanCommand(input: string, options: ScanOptions): Promise<void> {
  try {
    const inputRoot = resolve(input);
    if (!(await isDirectory(inputRoot))) {
      throw new InputDirectoryError(inputRoot);
    }

    const files = await scanVideoFiles(inputRoot, options.recursive ?? false);
    const paths = files.map((file) => relative(inputRoot, file.path)).sort();

    for (const path of paths) {
      console.log(path);
    }
    printInfo(`${paths.length} video file(s) in ${inputRoot}`);
  } catch (error) {
    printError(errorMessage(error));
    process.exit(1);
  }
}
