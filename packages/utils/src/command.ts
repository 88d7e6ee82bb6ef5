/**
 * Command Execution Wrapper
 *
 * Runs an external program with an explicit argument list (never through a
 * shell), capturing its output. Arguments reach the child process verbatim.
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  timeout?: number; // milliseconds
}

// Bytes kept per output stream
const MAX_CAPTURED_OUTPUT = 10 * 1024 * 1024;

/**
 * Execute an external command safely
 *
 * Resolves with the exit status whatever it is; rejects only when the
 * process cannot be spawned (binary missing, permission denied).
 */
export async function executeCommand(
  command: string,
  args: readonly string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const { timeout = 300000 } = options; // 5 minutes default

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, [...args], spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;
    let killTimer: NodeJS.Timeout | null = null;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      // Force kill after 10 seconds
      killTimer = setTimeout(() => child.kill('SIGKILL'), 10000);
    }, timeout);

    const cleanup = (): void => {
      clearTimeout(timeoutId);
      if (killTimer) clearTimeout(killTimer);
    };

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < MAX_CAPTURED_OUTPUT) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < MAX_CAPTURED_OUTPUT) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, exitSignal) => {
      cleanup();

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
}

/**
 * Render a command line for logging. Not meant to be fed back to a shell.
 */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map((arg) => (/[\s'"]/.test(arg) ? `"${arg.replace(/"/g, '\\"')}"` : arg))
    .join(' ');
}

/**
 * Last lines of a diagnostic stream, for log context
 */
export function tailLines(text: string, count: number = 5): string {
  const lines = text.trim().split('\n');
  return lines.slice(-count).join('\n');
}
