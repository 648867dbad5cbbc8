/**
 * Error classes for pkgdelta with helpful user-facing messages
 */

export type ErrorCode =
  | 'REPOSITORY_ERROR'
  | 'REF_RESOLUTION_ERROR'
  | 'COMMIT_RESOLUTION_ERROR'
  | 'RECIPE_READ_ERROR'
  | 'INVALID_CONFIG'
  | 'CONFIG_EXISTS'
  | 'UNKNOWN_FORMAT'
  | 'UNKNOWN_ERROR';

/**
 * Base error class for pkgdelta with code, subject and suggestion.
 *
 * `subject` carries the offending path or ref so the CLI can name it.
 */
export class PkgDeltaError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public suggestion?: string,
    public subject?: string
  ) {
    super(message);
    this.name = 'PkgDeltaError';
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Format error for CLI display with color support
   */
  format(useColor = true): string {
    const red = useColor ? '\x1b[31m' : '';
    const yellow = useColor ? '\x1b[33m' : '';
    const reset = useColor ? '\x1b[0m' : '';

    let output = `${red}Error [${this.code}]:${reset} ${this.message}`;

    if (this.suggestion) {
      output += `\n\n${yellow}Suggestion:${reset} ${this.suggestion}`;
    }

    return output;
  }
}

/**
 * The path is not the root of a git working copy, or its metadata is unreadable
 */
export class RepositoryError extends PkgDeltaError {
  constructor(repoPath: string, reason?: string) {
    super(
      `Failed to open repository at ${repoPath}${reason ? `: ${reason}` : ''}`,
      'REPOSITORY_ERROR',
      `Check that ${repoPath} is the top level of a git checkout and is readable.`,
      repoPath
    );
    this.name = 'RepositoryError';
  }
}

/**
 * An explicit base ref does not name any object
 */
export class RefResolutionError extends PkgDeltaError {
  constructor(ref: string, reason?: string) {
    super(
      `Failed to parse base ref: ${ref}${reason ? ` (${reason})` : ''}`,
      'REF_RESOLUTION_ERROR',
      `Use a branch, tag or commit id that exists locally.
In shallow CI clones, fetch more history first (git fetch --deepen=1).`,
      ref
    );
    this.name = 'RefResolutionError';
  }
}

/**
 * HEAD or a resolved ref cannot be peeled to a commit
 */
export class CommitResolutionError extends PkgDeltaError {
  constructor(ref: string, reason?: string) {
    super(
      `Failed to peel ${ref} to a commit${reason ? `: ${reason}` : ''}`,
      'COMMIT_RESOLUTION_ERROR',
      ref === 'HEAD'
        ? 'The repository has no commits yet. Commit something before detecting changes.'
        : `${ref} exists but does not point at a commit. Pass a commit-ish ref instead.`,
      ref
    );
    this.name = 'CommitResolutionError';
  }
}

/**
 * A recipe file is missing, unreadable, fails to source, or lacks a field
 */
export class RecipeReadError extends PkgDeltaError {
  constructor(recipePath: string, reason: string) {
    super(
      `${reason} (${recipePath})`,
      'RECIPE_READ_ERROR',
      `Check that the recipe exists and defines the field as a plain assignment.`,
      recipePath
    );
    this.name = 'RecipeReadError';
  }
}

/**
 * Error factory functions with predefined messages and suggestions
 */
export const errors = {
  invalidConfig(path: string, details?: string): PkgDeltaError {
    return new PkgDeltaError(
      `Invalid configuration file at ${path}${details ? `: ${details}` : ''}`,
      'INVALID_CONFIG',
      `Fix the offending key or run 'pkgdelta init --force' to write a fresh file.`,
      path
    );
  },

  configExists(path: string): PkgDeltaError {
    return new PkgDeltaError(
      `Configuration already exists at ${path}`,
      'CONFIG_EXISTS',
      `Use --force to overwrite it in non-interactive mode.`,
      path
    );
  },

  unknownFormat(format: string): PkgDeltaError {
    return new PkgDeltaError(
      `Unknown format: ${format}`,
      'UNKNOWN_FORMAT',
      `Use --format space or --format json.`,
      format
    );
  },

  unknown(error: unknown): PkgDeltaError {
    return new PkgDeltaError(`An unexpected error occurred: ${describeError(error)}`, 'UNKNOWN_ERROR');
  },
};

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Type guard to check if an error is a PkgDeltaError
 */
export function isPkgDeltaError(error: unknown): error is PkgDeltaError {
  return error instanceof PkgDeltaError;
}

/**
 * Format any error for CLI display
 */
export function formatError(error: unknown, useColor = true): string {
  if (isPkgDeltaError(error)) {
    return error.format(useColor);
  }

  return errors.unknown(error).format(useColor);
}

/**
 * Handle errors in CLI commands by printing them and setting a failing exit code
 */
export function handleError(error: unknown): void {
  console.error(formatError(error, Boolean(process.stderr.isTTY)));
  process.exitCode = 1;
}
