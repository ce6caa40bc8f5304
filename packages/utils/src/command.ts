/**
 * Command Execution Wrapper
 *
 * Wrapper for running external tools (installers, packagers) with:
 * - Timeout handling
 * - Output capture
 * - Optional echo of the tool's native output
 * - Abort signal forwarding
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  command: string;
  args: string[];
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
  /** Mirror the tool's stdout/stderr to this process while capturing it */
  echo?: boolean;
}

/**
 * Anything that can run a command the way executeCommand does.
 * The build pipeline takes one of these so tests can substitute the tools.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Exit code reported when the command itself could not be started
 * (same convention as POSIX shells for "command not found").
 */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * Execute an external command
 *
 * Resolves with the exit code even when it is non-zero; callers decide
 * whether that is a failure. Rejects only when the process cannot be spawned.
 */
export const executeCommand: CommandRunner = async (command, args, options = {}) => {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 30 * 60 * 1000,
    maxOutputSize = 10 * 1024 * 1024,
    signal,
    echo = false,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    // npm and friends are .cmd shims on Windows, so they go through cmd.exe
    // as one pre-quoted line; cmd.exe does not split an args array safely
    const child = process.platform === 'win32'
      ? spawn(formatCmdLine(command, args), { ...spawnOptions, shell: true })
      : spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      setTimeout(() => child.kill('SIGKILL'), 10000).unref();
    }, timeout);

    const onAbort = (): void => {
      child.kill('SIGTERM');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout?.on('data', (data: Buffer) => {
      if (echo) {
        process.stdout.write(data);
      }
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (echo) {
        process.stderr.write(data);
      }
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, exitSignal) => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);

      resolve({
        command,
        args,
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
      reject(error);
    });
  });
};

function quoteCmdArg(arg: string): string {
  if (arg === '') {
    return '""';
  }
  return /[\s"&|<>^()]/.test(arg) ? `"${arg.replace(/"/g, '""')}"` : arg;
}

/**
 * Command line as cmd.exe must receive it: arguments with spaces or shell
 * metacharacters are wrapped in double quotes, inner quotes doubled
 */
export function formatCmdLine(command: string, args: string[]): string {
  return [command, ...args].map(quoteCmdArg).join(' ');
}

/**
 * Render a command line for logs and error messages
 */
export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/[\s"]/.test(part) ? `"${part.replace(/"/g, '\\"')}"` : part))
    .join(' ');
}
