import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { TimelapseJob } from '@timelapse/core';
import { DEFAULT_TIMESTAMP_STYLE } from '@timelapse/core';
import type { MetadataField, MetadataReader } from '@timelapse/media';

import type { EncoderInvocation } from '../src/commandBuilder.js';
import type { Encoder, EncoderResult } from '../src/encoder.js';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'timelapse-processing-'));
}

export function frameName(index: number): string {
  return `TLS_${String(index).padStart(9, '0')}.jpg`;
}

/**
 * Empty frame files; only their names matter to the resolver. Written in
 * small batches to stay clear of the open file limit.
 */
export async function writeFrames(folder: string, first: number, last: number): Promise<void> {
  for (let batchStart = first; batchStart <= last; batchStart += 100) {
    const writes: Promise<void>[] = [];
    for (let index = batchStart; index <= Math.min(last, batchStart + 99); index++) {
      writes.push(fs.writeFile(path.join(folder, frameName(index)), ''));
    }
    await Promise.all(writes);
  }
}

export function makeJob(overrides: Partial<TimelapseJob> = {}): TimelapseJob {
  return {
    id: 'test-job',
    sourceFolder: '/frames',
    outputPath: '/videos/out.mp4',
    startFrame: 1,
    frameRate: 30,
    rotation: 'cw',
    timestamp: { enabled: false, style: { ...DEFAULT_TIMESTAMP_STYLE } },
    ...overrides,
  };
}

type EncodeBehaviour = (invocation: EncoderInvocation) => Promise<EncoderResult>;

/**
 * Records invocations; by default writes a 2048-byte output and exits 0
 */
export class FakeEncoder implements Encoder {
  readonly invocations: EncoderInvocation[] = [];
  private behaviour: EncodeBehaviour;

  constructor(behaviour?: EncodeBehaviour) {
    this.behaviour = behaviour ?? FakeEncoder.writesOutput(2048);
  }

  static writesOutput(size: number, exitCode: number = 0): EncodeBehaviour {
    return async (invocation) => {
      await fs.writeFile(invocation.outputFile, Buffer.alloc(size));
      return { exitCode, stderr: '', duration: 1, timedOut: false };
    };
  }

  static exits(exitCode: number, stderr: string = ''): EncodeBehaviour {
    return async () => ({ exitCode, stderr, duration: 1, timedOut: false });
  }

  async encode(invocation: EncoderInvocation): Promise<EncoderResult> {
    this.invocations.push(invocation);
    return this.behaviour(invocation);
  }
}

export class FakeMetadataReader implements MetadataReader {
  readonly reads: { filePath: string; field: MetadataField }[] = [];
  private values: Partial<Record<MetadataField, string>>;
  private failure: Error | null;

  constructor(values: Partial<Record<MetadataField, string>> = {}, failure: Error | null = null) {
    this.values = values;
    this.failure = failure;
  }

  async readField(filePath: string, field: MetadataField): Promise<string | null> {
    this.reads.push({ filePath, field });
    if (this.failure) {
      throw this.failure;
    }
    return this.values[field] ?? null;
  }
}
