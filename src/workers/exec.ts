/**
 * Child process runner for the media tools (yt-dlp, ffprobe, ffmpeg).
 *
 * @module workers/exec
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  code: number;
  /** Raw stdout; frames arrive as PNG bytes */
  stdout: Buffer;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  /** Kill the process after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Runs an external command to completion.
 *
 * Media helpers take a runner so tests can replace the executables.
 */
export type CommandRunner = (args: string[], options?: CommandOptions) => Promise<CommandResult>;

/**
 * Error raised when a command exits non-zero, times out or cannot start.
 */
export class CommandError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly code: number | null,
    public readonly stderr: string = ''
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

export const runCommand: CommandRunner = (args, options = {}) => {
  const [cmd, ...rest] = args;
  if (!cmd) {
    return Promise.reject(new Error('runCommand requires at least one argument'));
  }

  return new Promise((resolve, reject) => {
    const proc = spawn(cmd, rest, {
      stdio: ['ignore', 'pipe', 'pipe'],
      cwd: options.cwd,
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;

    const timeoutId =
      options.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            proc.kill('SIGKILL');
          }, options.timeoutMs)
        : undefined;

    proc.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    proc.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    proc.on('error', (error) => {
      clearTimeout(timeoutId);
      reject(new CommandError(`Failed to start ${cmd}: ${error.message}`, cmd, null));
    });

    proc.on('close', (code) => {
      clearTimeout(timeoutId);
      const stderr = Buffer.concat(stderrChunks).toString('utf-8');
      if (timedOut) {
        reject(new CommandError(`${cmd} timed out after ${options.timeoutMs}ms`, cmd, code, stderr));
        return;
      }
      resolve({
        code: code ?? 1,
        stdout: Buffer.concat(stdoutChunks),
        stderr,
      });
    });
  });
};

/**
 * Run a command and require a zero exit code.
 *
 * @throws CommandError on non-zero exit
 */
export async function runChecked(
  runner: CommandRunner,
  args: string[],
  options?: CommandOptions
): Promise<CommandResult> {
  const result = await runner(args, options);
  if (result.code !== 0) {
    const command = args[0] ?? '';
    throw new CommandError(
      `${command} exited with code ${result.code}: ${result.stderr.trim().slice(0, 500)}`,
      command,
      result.code,
      result.stderr
    );
  }
  return result;
}
