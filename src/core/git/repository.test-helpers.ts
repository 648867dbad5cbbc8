/**
 * In-process Repository stand-in for tests
 */

import type { SubmoduleEntry, TreeDelta } from '../../types/index.js';
import { CommitResolutionError, RefResolutionError, RepositoryError } from '../../utils/errors.js';
import { isPathOwnedBy } from '../packages/package.js';
import type { Repository, RepositoryOpener } from './repository.js';

export interface FakeRepositoryInit {
  submodules?: SubmoduleEntry[];
  /** HEAD commit id; null for an unborn branch */
  head?: string | null;
  /** Commit id -> first parent (null for a root commit) */
  commits?: Record<string, string | null>;
  /** Symbolic refs -> commit id */
  refs?: Record<string, string>;
  /** Refs that exist but do not point at a commit (e.g. a tree) */
  nonCommitRefs?: string[];
  /** `${base}..${head}` -> deltas */
  diffs?: Record<string, TreeDelta[]>;
}

export class FakeRepository implements Repository {
  closed = false;
  opens = 0;
  readonly diffCalls: Array<{ base: string; head: string; pathspec: string[] }> = [];

  private readonly init: Required<FakeRepositoryInit>;

  constructor(public readonly rootPath: string, init: FakeRepositoryInit = {}) {
    this.init = {
      submodules: init.submodules ?? [],
      head: init.head ?? null,
      commits: init.commits ?? {},
      refs: init.refs ?? {},
      nonCommitRefs: init.nonCommitRefs ?? [],
      diffs: init.diffs ?? {},
    };
  }

  /** Opener handing out this instance, reopened on every call */
  opener(): RepositoryOpener {
    return async () => {
      this.closed = false;
      this.opens++;
      return this;
    };
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new RepositoryError(this.rootPath, 'repository handle already closed');
    }
  }

  async listSubmodules(): Promise<SubmoduleEntry[]> {
    this.ensureOpen();
    return this.init.submodules;
  }

  async resolveCommit(ref: string): Promise<string> {
    this.ensureOpen();
    if (this.init.nonCommitRefs.includes(ref)) {
      throw new CommitResolutionError(ref);
    }
    const target = this.init.refs[ref];
    if (target !== undefined) return target;
    if (ref in this.init.commits) return ref;
    throw new RefResolutionError(ref);
  }

  async headCommit(): Promise<string> {
    this.ensureOpen();
    if (this.init.head === null) {
      throw new CommitResolutionError('HEAD');
    }
    return this.init.head;
  }

  async firstParent(commit: string): Promise<string | null> {
    this.ensureOpen();
    return this.init.commits[commit] ?? null;
  }

  async diffTrees(base: string, head: string, pathspec: string[] = []): Promise<TreeDelta[]> {
    this.ensureOpen();
    this.diffCalls.push({ base, head, pathspec });
    const deltas = this.init.diffs[`${base}..${head}`] ?? [];
    if (pathspec.length === 0) return deltas;
    return deltas.filter((delta) =>
      pathspec.some(
        (spec) =>
          isPathOwnedBy(delta.path, spec) ||
          (delta.oldPath !== undefined && isPathOwnedBy(delta.oldPath, spec))
      )
    );
  }

  close(): void {
    this.closed = true;
  }
}
