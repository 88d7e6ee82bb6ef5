/**
 * Outcome Types
 */

import type { ErrorCode, WarningCode } from '../errors/index.js';
import type { ResolvedRange, TimelapseJob } from './job.js';

export type OutcomeStatus = 'succeeded' | 'failed';

export interface JobWarning {
  code: WarningCode;
  message: string;
}

export interface JobOutcome {
  readonly job: TimelapseJob;
  readonly status: OutcomeStatus;
  readonly reason?: ErrorCode;
  readonly message?: string;
  readonly outputSize?: number;
  readonly warnings: readonly JobWarning[];
  readonly range?: ResolvedRange;
  readonly durationSeconds?: number;
  readonly filterChain?: string;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  outcomes: readonly JobOutcome[];
}
