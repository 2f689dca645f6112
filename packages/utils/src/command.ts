/**
 * Command Execution Wrapper
 * 
 * Safe wrapper for executing external commands with:
 * - Optional timeout handling
 * - Output capture
 * - Spawn error propagation
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
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds, 0 or undefined = wait forever
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
  detached?: boolean; // own process group: terminal Ctrl+C does not reach the child
}

/**
 * Anything that runs an external program the way executeCommand does.
 * Tests swap in a fake.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

// Grace period between SIGTERM and SIGKILL
const KILL_GRACE_MS = 10000;

/**
 * Execute an external command safely
 * 
 * Resolves with the exit code whatever it is; rejects only when the
 * process cannot be spawned at all (ENOENT, EACCES).
 */
export const executeCommand: CommandRunner = async (command, args, options = {}) => {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout,
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
    detached = false,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise<CommandResult>((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached,
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;

    let timeoutId: NodeJS.Timeout | null = null;
    let killId: NodeJS.Timeout | null = null;
    if (timeout && timeout > 0) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
        killId = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
      }, timeout);
    }

    const onAbort = (): void => {
      child.kill('SIGTERM');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const cleanup = (): void => {
      if (timeoutId) clearTimeout(timeoutId);
      if (killId) clearTimeout(killId);
      signal?.removeEventListener('abort', onAbort);
    };

    // Capture stdout with size limit
    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    // Capture stderr with size limit
    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
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
};

/**
 * Render a command line for logs, quoting arguments that contain spaces
 */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map((a) => (a.includes(' ') ? `"${a}"` : a)).join(' ');
}
