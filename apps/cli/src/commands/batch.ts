/**
 * Batch Command
 * 
 * Encode every job listed in a batch description file, one at a time.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { DEFAULT_TIMESTAMP_STYLE, isTimelapseError } from '@timelapse/core';
import {
  BatchRunner,
  entryToJob,
  loadBatchFile,
  type BatchDefaults,
  type BatchEntry,
} from '@timelapse/processing';
import { config } from '../config/index.js';
import { createJobRunner } from '../lib/runtime.js';
import {
  printError,
  printHeader,
  printInfo,
  printKeyValue,
  printOutcomeDetails,
  printSummary,
  printWarnings,
} from '../lib/output.js';

export const DEFAULT_BATCH_FILE = 'timelapse_config.txt';

export interface BatchOptions {
  outputDir: string;
  timestamp: boolean;
  preset?: string;
}

export function batchDefaults(options: BatchOptions): BatchDefaults {
  return {
    outputDir: options.outputDir,
    frameRate: config.defaults.frameRate,
    rotation: config.defaults.rotation,
    timestamp: { enabled: options.timestamp, style: { ...DEFAULT_TIMESTAMP_STYLE } },
  };
}

export async function batchCommand(file: string | undefined, options: BatchOptions): Promise<void> {
  const configFile = file ?? DEFAULT_BATCH_FILE;

  let entries: BatchEntry[];
  try {
    entries = await loadBatchFile(configFile);
  } catch (error) {
    if (!isTimelapseError(error)) throw error;

    printError(error.message);
    console.log();
    console.log(chalk.gray('Create a config file with this format:'));
    console.log(chalk.gray('  date,folder,start_frame,end_frame,fps,rotate'));
    console.log(chalk.gray('Example:'));
    console.log(chalk.gray('  2024-01-15,./sunset_frames,1,1800,30,cw'));
    console.log(chalk.gray('  2024-01-17,./city_timelapse,1,,30,cw'));
    process.exitCode = 1;
    return;
  }

  printHeader('Batch Time-lapse Creator');
  printKeyValue('Config file', configFile);
  printKeyValue('Jobs', entries.length);

  if (entries.length === 0) {
    printInfo('No jobs listed');
  }

  const defaults = batchDefaults(options);
  const jobs = entries.map((entry) => entryToJob(entry, defaults));
  const runner = new BatchRunner(createJobRunner(options.preset));

  let spinner: Ora | null = null;
  const startedAt = Date.now();

  const summary = await runner.run(jobs, {
    onJobStart: (job, position, total) => {
      const entry = entries[position - 1];
      console.log();
      console.log(chalk.bold(`Processing line ${entry?.lineNumber ?? position}: ${entry?.date ?? job.id}`));
      printKeyValue('Folder', job.sourceFolder);
      printKeyValue('Start', job.startFrame);
      printKeyValue('End', job.endFrame ?? 'auto-detect');
      printKeyValue('FPS', job.frameRate);
      printKeyValue('Rotation', job.rotation);
      printKeyValue('Output', job.outputPath);
      spinner = ora(`[${position}/${total}] Encoding...`).start();
    },
    onJobComplete: (outcome) => {
      if (outcome.status === 'succeeded') {
        spinner?.succeed(`Success: ${outcome.job.outputPath} created`);
      } else {
        spinner?.fail(outcome.message ?? `Failed to create ${outcome.job.outputPath}`);
      }
      spinner = null;
      printWarnings(outcome.warnings);
      printOutcomeDetails(outcome);
    },
  });

  printSummary(summary, Date.now() - startedAt);
  // Per-job failures are reported in the summary, not the exit code
  process.exitCode = 0;
}
