/**
 * Extract Command
 * 
 * Extract the selected audio track of every video in a folder.
 */

import ora from 'ora';
import chalk from 'chalk';
import {
  errorMessage,
  getBinariesConfig,
  parseJobConfiguration,
  toStreamSpecifier,
  type BatchProgress,
  type BatchSummary,
} from '@audex/core';
import { BatchDispatcher, prepareBatch } from '@audex/processing';
import { formatDuration } from '@audex/utils';
import { loadConfig } from '../config/index.js';
import { buildJobInput, type ExtractOptions } from '../lib/options.js';
import {
  colorizeLogLine,
  printError,
  printHeader,
  printInfo,
  printKeyValue,
  printSuccess,
  printWarning,
} from '../lib/output.js';

// Conventional exit code for a run stopped with Ctrl+C
const EXIT_CANCELLED = 130;

export async function extractCommand(input: string, options: ExtractOptions): Promise<void> {
  const spinner = ora('Checking ffmpeg and ffprobe...');

  try {
    const config = parseJobConfiguration(buildJobInput(input, options, loadConfig()));
    const binaries = getBinariesConfig();

    spinner.start();
    const prepared = await prepareBatch(config, { binaries });

    if (prepared.files.length === 0) {
      spinner.stop();
      printInfo(`No video files found in ${prepared.config.inputRoot}`);
      return;
    }

    spinner.stop();
    printHeader('Audio Extraction');
    printKeyValue('Input', prepared.config.inputRoot);
    printKeyValue('Output', prepared.config.outputRoot);
    printKeyValue('Mode', prepared.config.mode);
    printKeyValue('Stream', toStreamSpecifier(prepared.config.stream));
    printKeyValue('Files', prepared.files.length);
    printKeyValue('Workers', prepared.config.workers);
    console.log();

    const dispatcher = new BatchDispatcher({
      ffmpegPath: binaries.ffmpeg.resolvedPath,
      ffprobePath: binaries.ffprobe.resolvedPath,
    });

    spinner.start(`Processing ${prepared.files.length} file(s)...`);

    dispatcher.on('log', (line: string) => {
      spinner.clear();
      console.log(colorizeLogLine(line));
      spinner.render();
    });
    dispatcher.on('status', (text: string) => {
      spinner.text = text;
    });
    dispatcher.on('progress', ({ done, total }: BatchProgress) => {
      spinner.prefixText = chalk.gray(`[${done}/${total}]`);
    });

    const onInterrupt = (): void => {
      if (dispatcher.cancel()) {
        spinner.text = 'Cancelling... running files will finish first';
      }
    };
    process.on('SIGINT', onInterrupt);

    let summary: BatchSummary;
    try {
      summary = await dispatcher.run(prepared.files, prepared.config);
    } finally {
      process.off('SIGINT', onInterrupt);
    }

    spinner.prefixText = '';
    if (summary.cancelled) {
      spinner.warn('Cancelled');
    } else if (summary.failed > 0) {
      spinner.fail('Finished with failures');
    } else {
      spinner.succeed('Finished');
    }

    printSummary(summary);
    process.exitCode = summary.cancelled ? EXIT_CANCELLED : summary.failed > 0 ? 1 : 0;
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail('Extraction failed');
    }
    printError(errorMessage(error));
    process.exit(1);
  }
}

function printSummary(summary: BatchSummary): void {
  printHeader('Summary');
  printKeyValue('Total', summary.total);
  printKeyValue('Completed', summary.completed);
  printKeyValue('Succeeded', chalk.green(summary.succeeded));
  printKeyValue('Failed', summary.failed > 0 ? chalk.red(summary.failed) : summary.failed);
  printKeyValue('Duration', formatDuration(summary.durationMs));
  console.log();

  if (summary.cancelled) {
    printWarning(`Cancelled. OK: ${summary.succeeded}, Failed: ${summary.failed}`);
  } else if (summary.failed > 0) {
    printError(`${summary.failed} file(s) failed`);
  } else {
    printSuccess(`All ${summary.succeeded} file(s) extracted`);
  }
}
