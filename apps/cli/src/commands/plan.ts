/**
 * Plan Command
 * 
 * Find the sunrises and sunsets a folder of frames covers and encode a short
 * clip around each one. A folder without frames is treated as a parent of
 * capture folders. Clips whose output already exists are skipped.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { DEFAULT_TIMESTAMP_STYLE, isTimelapseError } from '@timelapse/core';
import { planSunEventsInTree, type SunEventPlan } from '@timelapse/planner';
import { BatchRunner } from '@timelapse/processing';
import { config } from '../config/index.js';
import { createJobRunner, createMetadataReader } from '../lib/runtime.js';
import {
  printError,
  printHeader,
  printInfo,
  printJson,
  printKeyValue,
  printOutcomeDetails,
  printSummary,
  printWarnings,
} from '../lib/output.js';

export interface PlanOptions {
  outputDir: string;
  latitude?: number;
  longitude?: number;
  utcOffset?: number;
  interval: number;
  duration: number;
  fps?: number;
  rotate?: string;
  timestamp: boolean;
  dryRun?: boolean;
  json?: boolean;
  preset?: string;
}

function printPlan(plan: SunEventPlan): void {
  printHeader('Sun Event Plan');
  printKeyValue('Folder', plan.folder);
  printKeyValue('Capture window', `${plan.captureStart ?? '?'} to ${plan.captureEnd ?? '?'}`);
  printWarnings(plan.warnings);

  if (plan.clips.length === 0) {
    printInfo('No sunrise or sunset inside the capture window');
    return;
  }

  console.log();
  for (const clip of plan.clips) {
    const status = clip.skipped ? chalk.gray('exists, skipping') : chalk.green('planned');
    console.log(
      `  ${chalk.cyan(`${clip.date} ${clip.event}`)} at ${clip.eventTime}: ` +
      `frames ${clip.startFrame}-${clip.endFrame} -> ${clip.outputPath} (${status})`
    );
  }
}

export async function planCommand(folder: string, options: PlanOptions): Promise<void> {
  const frameRate = options.fps ?? config.defaults.frameRate;

  let plans: SunEventPlan[];
  try {
    plans = await planSunEventsInTree(folder, {
      outputDir: options.outputDir,
      site: {
        latitude: options.latitude ?? config.site.latitude,
        longitude: options.longitude ?? config.site.longitude,
        utcOffsetHours: options.utcOffset ?? config.site.utcOffsetHours,
      },
      frameIntervalSeconds: options.interval,
      clipSeconds: options.duration,
      frameRate,
      rotation: options.rotate ?? config.defaults.rotation,
      timestamp: { enabled: options.timestamp, style: { ...DEFAULT_TIMESTAMP_STYLE } },
      metadataReader: createMetadataReader(),
    });
  } catch (error) {
    if (!isTimelapseError(error)) throw error;
    printError(error.message);
    process.exitCode = 1;
    return;
  }

  if (options.json) {
    printJson(plans);
  } else {
    plans.forEach(printPlan);
  }

  const pending = plans.flatMap((plan) => plan.clips).filter((clip) => !clip.skipped);
  if (options.dryRun || pending.length === 0) {
    process.exitCode = 0;
    return;
  }

  const runner = new BatchRunner(createJobRunner(options.preset));
  let spinner: Ora | null = null;
  const startedAt = Date.now();

  const summary = await runner.run(pending.map((clip) => clip.job), {
    onJobStart: (job, position, total) => {
      spinner = ora(`[${position}/${total}] Encoding ${job.outputPath}...`).start();
    },
    onJobComplete: (outcome) => {
      if (outcome.status === 'succeeded') {
        spinner?.succeed(`Created ${outcome.job.outputPath}`);
      } else {
        spinner?.fail(outcome.message ?? `Failed to create ${outcome.job.outputPath}`);
      }
      spinner = null;
      printWarnings(outcome.warnings);
      printOutcomeDetails(outcome);
    },
  });

  printSummary(summary, Date.now() - startedAt);
  // Like batch runs, per-clip failures are reported in the summary only
  process.exitCode = 0;
}
