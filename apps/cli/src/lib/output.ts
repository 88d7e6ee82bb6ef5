/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { BatchSummary, JobOutcome, JobWarning } from '@timelapse/core';
import { formatBytes, formatDuration } from '@timelapse/utils';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

export function printWarnings(warnings: readonly JobWarning[]): void {
  for (const warning of warnings) {
    printWarning(warning.message);
  }
}

export function printOutcomeDetails(outcome: JobOutcome): void {
  if (outcome.range) {
    const auto = outcome.range.autoDetected ? chalk.gray(' (auto-detected end)') : '';
    printKeyValue('Frames', `${outcome.range.start} to ${outcome.range.end} (${outcome.range.frameCount} frames)${auto}`);
  }
  if (outcome.durationSeconds !== undefined) {
    printKeyValue('Duration', `~${outcome.durationSeconds.toFixed(2)} seconds`);
  }
  if (outcome.filterChain !== undefined) {
    printKeyValue('Filters', outcome.filterChain.length > 0 ? outcome.filterChain : chalk.gray('none'));
  }
  if (outcome.outputSize !== undefined) {
    printKeyValue('Size', formatBytes(outcome.outputSize));
  }
}

export function printSummary(summary: BatchSummary, elapsedMs?: number): void {
  printHeader('Batch Processing Complete');
  printKeyValue('Total videos processed', summary.total);
  printKeyValue('Successful', chalk.green(summary.succeeded.toString()));
  printKeyValue('Failed', summary.failed > 0 ? chalk.red(summary.failed.toString()) : summary.failed);
  if (elapsedMs !== undefined) {
    printKeyValue('Elapsed', formatDuration(elapsedMs));
  }
}
