import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import {
  ensureDir,
  fileExistsSync,
  getFileSizeBytes,
  isDirectory,
  removeFile,
  safeReadFile,
} from '../src/file.js';

let workDir: string;

beforeEach(async () => {
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'timelapse-utils-'));
});

afterEach(async () => {
  await fs.rm(workDir, { recursive: true, force: true });
});

describe('file helpers', () => {
  test('safeReadFile returns null for a missing file', async () => {
    expect(await safeReadFile(path.join(workDir, 'missing.txt'))).toBeNull();
  });

  test('getFileSizeBytes reports regular files only', async () => {
    const file = path.join(workDir, 'clip.mp4');
    await fs.writeFile(file, Buffer.alloc(2048));

    expect(await getFileSizeBytes(file)).toBe(2048);
    expect(await getFileSizeBytes(workDir)).toBeNull();
    expect(await getFileSizeBytes(path.join(workDir, 'missing.mp4'))).toBeNull();
  });

  test('isDirectory distinguishes folders from files', async () => {
    const file = path.join(workDir, 'TLS_000000001.jpg');
    await fs.writeFile(file, '');

    expect(await isDirectory(workDir)).toBe(true);
    expect(await isDirectory(file)).toBe(false);
    expect(await isDirectory(path.join(workDir, 'missing'))).toBe(false);
    expect(fileExistsSync(file)).toBe(true);
    expect(fileExistsSync(workDir)).toBe(false);
  });

  test('ensureDir and removeFile', async () => {
    const nested = path.join(workDir, 'a', 'b');
    await ensureDir(nested);
    expect(await isDirectory(nested)).toBe(true);

    const file = path.join(nested, 'stale.mp4');
    await fs.writeFile(file, 'old');
    await removeFile(file);
    await removeFile(file);
    expect(fileExistsSync(file)).toBe(false);
  });
});
