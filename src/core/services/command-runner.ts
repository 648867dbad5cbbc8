/**
 * Child-process runner
 *
 * Shells out with execFile (no shell interpolation of arguments). Git access and
 * the shell recipe reader both go through a CommandRunner.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

/** Generous cap: diffs of large trees can produce a lot of output */
const MAX_BUFFER = 64 * 1024 * 1024;

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandOutput>;

/**
 * A command that could not be started or exited non-zero
 */
export class CommandError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly args: string[],
    /** Exit status, or a spawn error code such as ENOENT */
    public readonly exitCode: number | string | undefined,
    public readonly stderr: string
  ) {
    super(message);
    this.name = 'CommandError';
  }

  /**
   * First non-empty stderr line, falling back to the message
   */
  get reason(): string {
    const line = this.stderr
      .split('\n')
      .map((l) => l.trim())
      .find(Boolean);
    return line ?? this.message;
  }
}

function toCommandError(command: string, args: string[], error: unknown): CommandError {
  if (!(error instanceof Error)) {
    return new CommandError(String(error), command, args, undefined, '');
  }

  const code = 'code' in error ? error.code : undefined;
  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';

  return new CommandError(
    error.message,
    command,
    args,
    typeof code === 'number' || typeof code === 'string' ? code : undefined,
    stderr
  );
}

/**
 * Default runner backed by node:child_process
 */
export const runCommand: CommandRunner = async (command, args, options = {}) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options.cwd,
      maxBuffer: MAX_BUFFER,
      encoding: 'utf8',
    });
    return { stdout, stderr };
  } catch (error) {
    throw toCommandError(command, args, error);
  }
};
