#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for audex.
 * Batch work lives in @audex/processing; this is the thin front end
 * that collects options and renders progress.
 */

import './env.js';
import { Command, Option } from 'commander';
import chalk from 'chalk';

// Commands
import { extractCommand } from './commands/extract.js';
import { checkCommand } from './commands/check.js';
import { scanCommand } from './commands/scan.js';

const program = new Command();

program
  .name('audex')
  .description('Batch-extract audio tracks from video files with ffmpeg')
  .version('0.1.0')
  // Read in env.ts, before any logger exists
  .option('--debug', 'Enable debug logging');

// ============================================
// EXTRACTION
// ============================================

program
  .command('extract <input>')
  .description('Extract one audio track from every video in a folder')
  .option('-o, --output <dir>', 'Output folder (default: ./audio_out or AUDEX_OUTPUT_DIR)')
  .option('-r, --recursive', 'Include subfolders')
  .option('--flat', 'Write all outputs directly into the output folder')
  .addOption(
    new Option('-m, --mode <mode>', 'Transcoding mode')
      .choices(['copy', 'mp3', 'aac', 'wav'])
      .default('copy')
  )
  .option('-i, --index <n>', 'Audio track by zero-based index (default: 0)')
  .option('-l, --language <code>', 'Audio track by ISO 639-2 language, e.g. eng')
  .option('--loudnorm', 'EBU R128 loudness normalization (-16 LUFS)')
  .option('--sample-rate <hz>', 'Output sample rate')
  .option('--bitrate <kbps>', 'Output bitrate (mp3, aac)')
  .option('--gpu', 'Decode with CUDA')
  .option('-w, --workers <n>', 'Files processed in parallel')
  .option('--timeout <seconds>', 'Give up on a file after this long (default: never)')
  .option('-p, --preset <name>', 'Apply a preset (music-gpu)')
  .action(extractCommand);

// ============================================
// SYSTEM COMMANDS
// ============================================

program
  .command('check')
  .description('Check that ffmpeg and ffprobe are available')
  .action(checkCommand);

program
  .command('scan <input>')
  .description('List the video files that would be processed')
  .option('-r, --recursive', 'Include subfolders')
  .action(scanCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('audex --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
await program.parseAsync();
