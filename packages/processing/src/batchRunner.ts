/**
 * Batch Runner
 *
 * Runs jobs strictly one after another in the order given. A failed job is
 * recorded and the batch moves on.
 */

import type { BatchSummary, JobOutcome, TimelapseJob } from '@timelapse/core';
import { createLogger } from '@timelapse/utils';

const logger = createLogger({ module: 'batchRunner' });

export interface JobExecutor {
  run(job: TimelapseJob): Promise<JobOutcome>;
}

/**
 * Running success/failure counts for one batch
 */
export class BatchTally {
  private outcomes: JobOutcome[] = [];
  private succeededCount = 0;
  private failedCount = 0;

  record(outcome: JobOutcome): this {
    this.outcomes.push(outcome);
    if (outcome.status === 'succeeded') {
      this.succeededCount++;
    } else {
      this.failedCount++;
    }
    return this;
  }

  get succeeded(): number {
    return this.succeededCount;
  }

  get failed(): number {
    return this.failedCount;
  }

  get total(): number {
    return this.outcomes.length;
  }

  summary(): BatchSummary {
    return {
      total: this.total,
      succeeded: this.succeededCount,
      failed: this.failedCount,
      outcomes: [...this.outcomes],
    };
  }
}

export interface BatchHooks {
  onJobStart?: (job: TimelapseJob, position: number, total: number) => void;
  onJobComplete?: (outcome: JobOutcome, tally: BatchTally) => void;
}

export class BatchRunner {
  private executor: JobExecutor;

  constructor(executor: JobExecutor) {
    this.executor = executor;
  }

  async run(jobs: readonly TimelapseJob[], hooks: BatchHooks = {}): Promise<BatchSummary> {
    const tally = new BatchTally();

    logger.info({ jobs: jobs.length }, 'Starting batch');

    for (const [index, job] of jobs.entries()) {
      hooks.onJobStart?.(job, index + 1, jobs.length);

      const outcome = await this.executor.run(job);
      tally.record(outcome);

      hooks.onJobComplete?.(outcome, tally);
    }

    const summary = tally.summary();
    logger.info({ total: summary.total, succeeded: summary.succeeded, failed: summary.failed }, 'Batch complete');

    return summary;
  }
}
