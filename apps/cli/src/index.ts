#!/usr/bin/env tsx
/**
 * CLI Entry Point
 * 
 * Command-line interface for encoding time-lapse videos from numbered
 * JPEG frames.
 */

// Must load first: sets LOG_LEVEL before any logger is created
import { config } from './config/index.js';

import { Command, type CommanderError } from 'commander';
import chalk from 'chalk';
import { DEFAULT_TIMESTAMP_STYLE } from '@timelapse/core';
import { TIMELAPSE_PRESETS } from '@timelapse/processing';
import { logger } from '@timelapse/utils';

import { makeCommand } from './commands/make.js';
import { batchCommand, DEFAULT_BATCH_FILE } from './commands/batch.js';
import { planCommand } from './commands/plan.js';
import { parseNumber } from './lib/parse.js';

const PRESET_HELP = `Encoding preset: ${Object.keys(TIMELAPSE_PRESETS).join(', ')} (default ${config.encoder.preset})`;

const program = new Command();

program
  .name('timelapse')
  .description('Encode time-lapse videos from TLS_*.jpg frame sequences')
  .version('0.1.0');

// ============================================
// ENCODING COMMANDS
// ============================================

program
  .command('make <folder> <output> [start] [end]')
  .description('Create one video from a folder of frames (end is auto-detected when omitted)')
  .option('--fps <rate>', `Frame rate (default ${config.defaults.frameRate})`, parseNumber)
  .option('--rotate <rotation>', `Rotation: none, cw, ccw, 180 (default ${config.defaults.rotation})`)
  .option('--no-timestamp', 'Do not overlay the capture time')
  .option('--font <path>', 'Font file for the timestamp')
  .option('--font-size <size>', 'Timestamp font size', parseNumber, DEFAULT_TIMESTAMP_STYLE.fontSize)
  .option('--font-color <color>', 'Timestamp font color', DEFAULT_TIMESTAMP_STYLE.fontColor)
  .option('--pos-x <pixels>', 'Timestamp x position', parseNumber, DEFAULT_TIMESTAMP_STYLE.x)
  .option('--pos-y <pixels>', 'Timestamp y position', parseNumber, DEFAULT_TIMESTAMP_STYLE.y)
  .option('--no-box', 'Draw the timestamp without a background box')
  .option('--box-color <color>', 'Timestamp box color', DEFAULT_TIMESTAMP_STYLE.boxColor)
  .option('--box-padding <pixels>', 'Timestamp box padding', parseNumber, DEFAULT_TIMESTAMP_STYLE.boxPadding)
  .option('--preset <name>', PRESET_HELP)
  .action(makeCommand);

program
  .command('batch [file]')
  .description(`Create every video listed in a batch file (default ${DEFAULT_BATCH_FILE})`)
  .option('-o, --output-dir <dir>', 'Directory for the videos', '.')
  .option('--timestamp', 'Overlay the capture time', false)
  .option('--preset <name>', PRESET_HELP)
  .action(batchCommand);

program
  .command('plan <folder>')
  .description('Create clips around each sunrise and sunset the frames cover')
  .option('-o, --output-dir <dir>', 'Directory for the clips', '.')
  .option('--latitude <degrees>', 'Camera latitude', parseNumber)
  .option('--longitude <degrees>', 'Camera longitude', parseNumber)
  .option('--utc-offset <hours>', 'Camera clock offset from UTC', parseNumber)
  .option('--interval <seconds>', 'Seconds between captured frames', parseNumber, 10)
  .option('--duration <seconds>', 'Length of each clip', parseNumber, 60)
  .option('--fps <rate>', 'Frame rate', parseNumber)
  .option('--rotate <rotation>', 'Rotation: none, cw, ccw, 180')
  .option('--timestamp', 'Overlay the capture time', false)
  .option('--dry-run', 'Print the plan without encoding')
  .option('--json', 'Print the plan as JSON')
  .option('--preset <name>', PRESET_HELP)
  .action(planCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err: CommanderError) => {
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('timelapse --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

program.parseAsync().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Unhandled error');
  console.error(chalk.red('Unexpected error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
