/**
 * Encoder
 * 
 * Runs a structured encoder invocation as a single child process.
 */

import { executeCommand, createLogger } from '@timelapse/utils';
import type { EncoderInvocation } from './commandBuilder.js';

const logger = createLogger({ module: 'encoder' });

export interface EncoderResult {
  exitCode: number;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface Encoder {
  /**
   * Run the invocation to completion. Rejects only when the process could
   * not be started at all.
   */
  encode(invocation: EncoderInvocation): Promise<EncoderResult>;
}

export interface FFmpegEncoderOptions {
  timeout?: number;
}

export class FFmpegEncoder implements Encoder {
  private timeout: number;

  constructor(options: FFmpegEncoderOptions = {}) {
    this.timeout = options.timeout ?? 3600000; // 1 hour default
  }

  async encode(invocation: EncoderInvocation): Promise<EncoderResult> {
    const result = await executeCommand(invocation.binary, invocation.args, {
      timeout: this.timeout,
    });

    if (result.timedOut) {
      logger.warn({ outputFile: invocation.outputFile, timeout: this.timeout }, 'Encoder timeout reached');
    }

    return {
      exitCode: result.exitCode,
      stderr: result.stderr,
      duration: result.duration,
      timedOut: result.timedOut,
    };
  }
}
