/**
 * Repository handle contract
 *
 * Each discovery or detection call opens its own handle and releases it on
 * return. There is no process-wide repository state.
 */

import type { SubmoduleEntry, TreeDelta } from '../../types/index.js';

export interface Repository {
  /** Absolute path of the working copy root */
  readonly rootPath: string;

  /** Submodules declared in .gitmodules, in declaration order */
  listSubmodules(): Promise<SubmoduleEntry[]>;

  /**
   * Resolve revision syntax to a commit id.
   * Throws RefResolutionError when the ref names nothing and
   * CommitResolutionError when it names a non-commit object.
   */
  resolveCommit(ref: string): Promise<string>;

  /** Commit id of HEAD; throws CommitResolutionError on an unborn branch */
  headCommit(): Promise<string>;

  /** First parent of `commit`, or null for a root commit */
  firstParent(commit: string): Promise<string | null>;

  /** Tree-to-tree diff between two commits, optionally limited to pathspecs */
  diffTrees(base: string, head: string, pathspec?: string[]): Promise<TreeDelta[]>;

  /** Release the handle; later calls fail */
  close(): void;
}

export type RepositoryOpener = (rootPath: string) => Promise<Repository>;

/**
 * Open a repository, run `fn` with it, and always release the handle
 */
export async function withRepository<T>(
  rootPath: string,
  open: RepositoryOpener,
  fn: (repo: Repository) => Promise<T>
): Promise<T> {
  const repo = await open(rootPath);
  try {
    return await fn(repo);
  } finally {
    repo.close();
  }
}
