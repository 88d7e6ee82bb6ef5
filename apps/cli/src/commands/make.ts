/**
 * Make Command
 * 
 * Encode a single time-lapse from one folder of frames.
 */

import ora from 'ora';
import chalk from 'chalk';
import type { TimelapseJob } from '@timelapse/core';
import { config } from '../config/index.js';
import { createJobRunner } from '../lib/runtime.js';
import { parseNumber, parseOptionalNumber } from '../lib/parse.js';
import {
  printError,
  printHeader,
  printKeyValue,
  printOutcomeDetails,
  printSuccess,
  printWarnings,
} from '../lib/output.js';

export interface MakeOptions {
  fps?: number;
  rotate?: string;
  timestamp: boolean;
  font?: string;
  fontSize: number;
  fontColor: string;
  posX: number;
  posY: number;
  box: boolean;
  boxColor: string;
  boxPadding: number;
  preset?: string;
}

export function buildMakeJob(
  folder: string,
  output: string,
  start: string | undefined,
  end: string | undefined,
  options: MakeOptions
): TimelapseJob {
  return {
    id: output,
    sourceFolder: folder,
    outputPath: output,
    startFrame: start === undefined ? 1 : parseNumber(start),
    endFrame: parseOptionalNumber(end),
    frameRate: options.fps ?? config.defaults.frameRate,
    rotation: options.rotate ?? config.defaults.rotation,
    timestamp: {
      enabled: options.timestamp,
      style: {
        fontPath: options.font,
        fontSize: options.fontSize,
        fontColor: options.fontColor,
        x: options.posX,
        y: options.posY,
        boxEnabled: options.box,
        boxColor: options.boxColor,
        boxPadding: options.boxPadding,
      },
    },
  };
}

export async function makeCommand(
  folder: string,
  output: string,
  start: string | undefined,
  end: string | undefined,
  options: MakeOptions
): Promise<void> {
  const job = buildMakeJob(folder, output, start, end, options);

  printHeader('Time-lapse Video Creator');
  printKeyValue('Input folder', job.sourceFolder);
  printKeyValue('Output file', job.outputPath);
  printKeyValue('Frame range', `${job.startFrame} to ${job.endFrame ?? 'auto-detect'}`);
  printKeyValue('Frame rate', `${job.frameRate} fps`);
  printKeyValue('Rotation', job.rotation);
  printKeyValue('Timestamp', job.timestamp.enabled ? 'yes' : 'no');
  console.log();

  const runner = createJobRunner(options.preset);
  const spinner = ora(`Encoding ${job.outputPath}...`).start();
  const outcome = await runner.run(job);

  if (outcome.status === 'succeeded') {
    spinner.succeed('Video created');
  } else {
    spinner.fail('Failed to create video');
  }

  printWarnings(outcome.warnings);
  printOutcomeDetails(outcome);
  console.log();

  if (outcome.status === 'succeeded') {
    printSuccess(`Output: ${chalk.cyan(job.outputPath)}`);
    process.exitCode = 0;
  } else {
    printError(outcome.message ?? 'Unknown error');
    process.exitCode = 1;
  }
}
