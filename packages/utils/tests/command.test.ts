import { describe, expect, test } from 'vitest';

import { executeCommand, formatCommandLine, tailLines } from '../src/command.js';

describe('executeCommand', () => {
  test('captures output and a nonzero exit status', async () => {
    const result = await executeCommand(process.execPath, [
      '-e',
      'process.stdout.write("frames"); process.stderr.write("oops"); process.exit(3)',
    ]);

    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe('frames');
    expect(result.stderr).toBe('oops');
    expect(result.timedOut).toBe(false);
  });

  test('passes arguments verbatim without a shell', async () => {
    const tricky = "TLS_%09d.jpg; echo 'x' $HOME";
    const result = await executeCommand(process.execPath, [
      '-e',
      'process.stdout.write(process.argv[1])',
      tricky,
    ]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe(tricky);
  });

  test('terminates a process that outlives its timeout', async () => {
    const result = await executeCommand(process.execPath, ['-e', 'setTimeout(() => {}, 30000)'], { timeout: 200 });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(128);
  });

  test('rejects when the binary cannot be started', async () => {
    await expect(executeCommand('/nonexistent/timelapse-encoder', ['-version'])).rejects.toThrow(/ENOENT/);
  });
});

describe('formatCommandLine', () => {
  test('quotes arguments containing whitespace', () => {
    expect(formatCommandLine('ffmpeg', ['-i', '/frames/my shots/TLS_%09d.jpg', 'out.mp4'])).toBe(
      'ffmpeg -i "/frames/my shots/TLS_%09d.jpg" out.mp4'
    );
  });
});

describe('tailLines', () => {
  test('keeps the last lines of a stream', () => {
    expect(tailLines('one\ntwo\nthree\nfour\n', 2)).toBe('three\nfour');
  });
});
