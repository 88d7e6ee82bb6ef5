import fs from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import type { JobOutcome, TimelapseJob } from '@timelapse/core';

import { DEFAULT_BATCH_DEFAULTS, entryToJob, parseBatchDescription } from '../src/batchFile.js';
import { BatchRunner, BatchTally, type JobExecutor } from '../src/batchRunner.js';
import { JobRunner } from '../src/jobRunner.js';
import { FakeEncoder, FakeMetadataReader, makeJob, makeTempDir, writeFrames } from './fixtures.js';

function outcomeFor(job: TimelapseJob, succeeded: boolean): JobOutcome {
  return succeeded
    ? { job, status: 'succeeded', outputSize: 1, warnings: [] }
    : { job, status: 'failed', reason: 'FOLDER_NOT_FOUND', message: 'missing', warnings: [] };
}

class ScriptedExecutor implements JobExecutor {
  readonly started: string[] = [];
  private active = 0;
  maxActive = 0;

  constructor(private failing: ReadonlySet<string>) {}

  async run(job: TimelapseJob): Promise<JobOutcome> {
    this.started.push(job.id);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.active--;
    return outcomeFor(job, !this.failing.has(job.id));
  }
}

describe('BatchTally', () => {
  test('counts outcomes by status', () => {
    const tally = new BatchTally()
      .record(outcomeFor(makeJob({ id: 'a' }), true))
      .record(outcomeFor(makeJob({ id: 'b' }), false));

    expect(tally.succeeded).toBe(1);
    expect(tally.failed).toBe(1);
    expect(tally.total).toBe(2);
    expect(tally.summary().outcomes.map((outcome) => outcome.job.id)).toEqual(['a', 'b']);
  });
});

describe('BatchRunner', () => {
  test('runs jobs one at a time in order and continues after a failure', async () => {
    const executor = new ScriptedExecutor(new Set(['two']));
    const positions: string[] = [];

    const summary = await new BatchRunner(executor).run(
      ['one', 'two', 'three'].map((id) => makeJob({ id })),
      {
        onJobStart: (job, position, total) => positions.push(`${job.id}:${position}/${total}`),
      }
    );

    expect(executor.started).toEqual(['one', 'two', 'three']);
    expect(executor.maxActive).toBe(1);
    expect(positions).toEqual(['one:1/3', 'two:2/3', 'three:3/3']);
    expect(summary.total).toBe(3);
    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(1);
  });

  test('reports running counts after each job', async () => {
    const seen: string[] = [];

    await new BatchRunner(new ScriptedExecutor(new Set(['one']))).run([makeJob({ id: 'one' }), makeJob({ id: 'two' })], {
      onJobComplete: (outcome, tally) => seen.push(`${outcome.status}:${tally.succeeded}/${tally.failed}`),
    });

    expect(seen).toEqual(['failed:0/1', 'succeeded:1/1']);
  });

  test('returns an empty summary for no jobs', async () => {
    expect(await new BatchRunner(new ScriptedExecutor(new Set())).run([])).toEqual({
      total: 0,
      succeeded: 0,
      failed: 0,
      outcomes: [],
    });
  });
});

describe('batch of real jobs', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  test('a missing folder fails only its own line', async () => {
    const first = path.join(workDir, 'day1');
    const third = path.join(workDir, 'day3');
    await fs.mkdir(first);
    await fs.mkdir(third);
    await writeFrames(first, 1, 10);
    await writeFrames(third, 1, 20);

    const entries = parseBatchDescription([
      `2024-01-15,${first},1,10,30,cw`,
      `2024-01-16,${path.join(workDir, 'nonexistent')},1,10,30,cw`,
      `2024-01-17,${third},1,,30,cw`,
    ].join('\n'));
    const outputDir = path.join(workDir, 'videos');
    const jobs = entries.map((entry) => entryToJob(entry, { ...DEFAULT_BATCH_DEFAULTS, outputDir }));

    const encoder = new FakeEncoder();
    const runner = new JobRunner({ encoder, metadataReader: new FakeMetadataReader() });
    const summary = await new BatchRunner(runner).run(jobs);

    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.outcomes.map((outcome) => outcome.reason ?? outcome.status)).toEqual([
      'succeeded',
      'FOLDER_NOT_FOUND',
      'succeeded',
    ]);
    expect(encoder.invocations.map((invocation) => invocation.outputFile)).toEqual([
      path.join(outputDir, 'timelapse_2024-01-15.mp4'),
      path.join(outputDir, 'timelapse_2024-01-17.mp4'),
    ]);
    expect(summary.outcomes[2]?.range).toEqual({ start: 1, end: 20, frameCount: 20, autoDetected: true });
  });
});
