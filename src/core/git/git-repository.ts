/**
 * Git-backed repository handle
 *
 * Shells out to git for submodule enumeration, revision parsing and
 * tree-to-tree diffs. Output is requested NUL-delimited (-z / --null) so
 * paths never need unquoting.
 */

import { access, realpath } from 'node:fs/promises';
import { join, posix, resolve } from 'node:path';
import type { SubmoduleEntry, TreeDelta, TreeDeltaStatus } from '../../types/index.js';
import { CommitResolutionError, RefResolutionError, RepositoryError } from '../../utils/errors.js';
import { normalizeRepoPath } from '../packages/package.js';
import { CommandError, runCommand, type CommandOutput, type CommandRunner } from '../services/command-runner.js';
import type { Repository, RepositoryOpener } from './repository.js';

// ============================================================================
// OUTPUT PARSING
// ============================================================================

/**
 * Parse `git config --null --get-regexp '^submodule\..*\.path$'` output.
 * Each record is `submodule.<name>.path\n<path>` terminated by NUL.
 */
export function parseSubmoduleConfig(output: string): SubmoduleEntry[] {
  const entries: SubmoduleEntry[] = [];

  for (const record of output.split('\0')) {
    const newline = record.indexOf('\n');
    if (newline === -1) continue;

    const key = record.slice(0, newline).trim();
    const value = record.slice(newline + 1);
    // Greedy: submodule names may themselves contain dots
    const match = /^submodule\.(.*)\.path$/.exec(key);
    if (!match || !value) continue;

    const path = normalizeRepoPath(value);
    entries.push({
      name: match[1] || posix.basename(path) || 'unknown',
      path,
    });
  }

  return entries;
}

/**
 * Parse a git status letter into a TreeDelta status
 */
function parseGitStatus(statusChar: string): TreeDeltaStatus {
  switch (statusChar) {
    case 'A': return 'added';
    case 'D': return 'deleted';
    case 'M': return 'modified';
    case 'R': return 'renamed';
    case 'C': return 'added'; // copied = effectively added
    default: return 'modified';
  }
}

/**
 * Parse `git diff-tree -r -z --name-status` output.
 * Renames and copies carry two paths: `R100\0old\0new\0`.
 */
export function parseDiffTree(output: string): TreeDelta[] {
  const deltas: TreeDelta[] = [];
  const tokens = output.split('\0');

  let i = 0;
  while (i < tokens.length) {
    const statusRaw = tokens[i].trim();
    if (!statusRaw) {
      i++;
      continue;
    }

    const statusChar = statusRaw.charAt(0);
    if (statusChar === 'R' || statusChar === 'C') {
      const oldPath = tokens[i + 1];
      const newPath = tokens[i + 2];
      if (!oldPath || !newPath) break;
      deltas.push({ status: parseGitStatus(statusChar), path: newPath, oldPath });
      i += 3;
    } else {
      const path = tokens[i + 1];
      if (!path) break;
      deltas.push({ status: parseGitStatus(statusChar), path });
      i += 2;
    }
  }

  return deltas;
}

function reasonOf(error: unknown): string {
  if (error instanceof CommandError) return error.reason;
  if (error instanceof Error) return error.message;
  return String(error);
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// REPOSITORY HANDLE
// ============================================================================

export class GitRepository implements Repository {
  private closed = false;

  private constructor(
    public readonly rootPath: string,
    private readonly runner: CommandRunner
  ) {}

  /**
   * Open the working copy whose top level is `rootPath`.
   * A subdirectory of a working copy is rejected: diff paths are relative
   * to the top level, package paths to `rootPath`, and both must agree.
   */
  static async open(rootPath: string, runner: CommandRunner = runCommand): Promise<GitRepository> {
    const absolute = resolve(rootPath);

    let toplevel: string;
    try {
      const { stdout } = await runner('git', ['rev-parse', '--show-toplevel'], { cwd: absolute });
      toplevel = stdout.trim();
    } catch (error) {
      throw new RepositoryError(rootPath, reasonOf(error));
    }

    if (!toplevel) {
      throw new RepositoryError(rootPath, 'not a git working copy');
    }

    let sameRoot: boolean;
    try {
      sameRoot = (await realpath(absolute)) === (await realpath(toplevel));
    } catch (error) {
      throw new RepositoryError(rootPath, reasonOf(error));
    }

    if (!sameRoot) {
      throw new RepositoryError(rootPath, `not the top level of the working copy (${toplevel})`);
    }

    return new GitRepository(absolute, runner);
  }

  private async git(args: string[]): Promise<CommandOutput> {
    if (this.closed) {
      throw new RepositoryError(this.rootPath, 'repository handle already closed');
    }
    return this.runner('git', args, { cwd: this.rootPath });
  }

  async listSubmodules(): Promise<SubmoduleEntry[]> {
    if (!(await fileExists(join(this.rootPath, '.gitmodules')))) {
      return [];
    }

    try {
      const { stdout } = await this.git([
        'config', '--file', '.gitmodules', '--null', '--get-regexp', '^submodule\\..*\\.path$',
      ]);
      return parseSubmoduleConfig(stdout);
    } catch (error) {
      // git config exits 1 when no key matches
      if (error instanceof CommandError && error.exitCode === 1) {
        return [];
      }
      if (error instanceof RepositoryError) throw error;
      throw new RepositoryError(this.rootPath, `failed to read .gitmodules: ${reasonOf(error)}`);
    }
  }

  async resolveCommit(ref: string): Promise<string> {
    // Refuse option-looking input before it reaches git's argument parser
    if (!ref.trim() || ref.startsWith('-')) {
      throw new RefResolutionError(ref, 'not a revision');
    }

    try {
      await this.git(['rev-parse', '--verify', '--quiet', ref]);
    } catch (error) {
      if (error instanceof RepositoryError) throw error;
      throw new RefResolutionError(ref);
    }

    try {
      const { stdout } = await this.git(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`]);
      return stdout.trim();
    } catch (error) {
      if (error instanceof RepositoryError) throw error;
      throw new CommitResolutionError(ref, reasonOf(error));
    }
  }

  async headCommit(): Promise<string> {
    try {
      const { stdout } = await this.git(['rev-parse', '--verify', '--quiet', 'HEAD^{commit}']);
      return stdout.trim();
    } catch (error) {
      if (error instanceof RepositoryError) throw error;
      throw new CommitResolutionError('HEAD', reasonOf(error));
    }
  }

  async firstParent(commit: string): Promise<string | null> {
    let stdout: string;
    try {
      ({ stdout } = await this.git(['rev-list', '--parents', '-n', '1', commit]));
    } catch (error) {
      if (error instanceof RepositoryError) throw error;
      throw new CommitResolutionError(commit, reasonOf(error));
    }

    // "<commit> <parent1> <parent2> ..."
    const ids = stdout.trim().split(/\s+/).filter(Boolean);
    return ids.length > 1 ? ids[1] : null;
  }

  async diffTrees(base: string, head: string, pathspec: string[] = []): Promise<TreeDelta[]> {
    const args = ['diff-tree', '-r', '-z', '-M', '--name-status', base, head];
    if (pathspec.length > 0) {
      args.push('--', ...pathspec);
    }

    try {
      const { stdout } = await this.git(args);
      return parseDiffTree(stdout);
    } catch (error) {
      if (error instanceof RepositoryError) throw error;
      throw new RepositoryError(this.rootPath, `failed to diff ${base}..${head}: ${reasonOf(error)}`);
    }
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Default opener used by discovery and change detection
 */
export const openGitRepository: RepositoryOpener = (rootPath) => GitRepository.open(rootPath);
