/**
 * Change detection
 *
 * Maps the paths touched between a base commit and HEAD onto the packages
 * that own them. Without an explicit base, HEAD's first parent is used; a
 * root commit (or an unreadable HEAD) falls back to a full rebuild where every
 * discovered package counts as changed.
 */

import type { ChangeDetectionResult, CommitRange, Package, TreeDelta } from '../../types/index.js';
import { describeError } from '../../utils/errors.js';
import logger from '../../utils/logger.js';
import { openGitRepository } from '../git/git-repository.js';
import { withRepository, type Repository } from '../git/repository.js';
import { PackageDiscoverer, type PackageDiscovererOptions } from '../packages/package-discoverer.js';
import { compareNames, findOwningPackage, normalizeRepoPath } from '../packages/package.js';

// ============================================================================
// TYPES
// ============================================================================

export type ChangeDetectorOptions = PackageDiscovererOptions;

// ============================================================================
// RANGE RESOLUTION
// ============================================================================

/**
 * Work out which commits to compare.
 *
 * An explicit base that fails to resolve is fatal. An implicit base never is:
 * any failure while reading HEAD or its parent becomes a full rebuild.
 */
export async function resolveCommitRange(repo: Repository, baseRef?: string): Promise<CommitRange> {
  if (baseRef !== undefined) {
    const base = await repo.resolveCommit(baseRef);
    const head = await repo.headCommit();
    return { kind: 'range', base, head };
  }

  try {
    const head = await repo.headCommit();
    const parent = await repo.firstParent(head);
    if (parent === null) {
      return { kind: 'full-rebuild', reason: 'HEAD has no parent commit' };
    }
    return { kind: 'range', base: parent, head };
  } catch (error) {
    logger.debug(`Could not read HEAD's parent: ${describeError(error)}`);
    return { kind: 'full-rebuild', reason: describeError(error) };
  }
}

// ============================================================================
// PATH MAPPING
// ============================================================================

/**
 * Both sides of every delta, so a rename out of one package and into another
 * touches both
 */
export function collectCandidatePaths(deltas: TreeDelta[]): string[] {
  const paths: string[] = [];
  for (const delta of deltas) {
    paths.push(normalizeRepoPath(delta.path));
    if (delta.oldPath !== undefined) {
      paths.push(normalizeRepoPath(delta.oldPath));
    }
  }
  return paths;
}

/**
 * Sorted, deduplicated names of the packages owning any of `paths`.
 * `packages` must be in discovery order: the first owner wins.
 */
export function mapPathsToPackages(paths: string[], packages: Package[]): string[] {
  const names = new Set<string>();
  for (const path of paths) {
    const owner = findOwningPackage(path, packages);
    if (owner) {
      names.add(owner.name);
    }
  }
  return [...names].sort(compareNames);
}

function allPackageNames(packages: Package[]): string[] {
  return [...new Set(packages.map((pkg) => pkg.name))].sort(compareNames);
}

// ============================================================================
// MAIN ENTRY POINTS
// ============================================================================

/**
 * Detect changed packages and return everything the decision was based on
 */
export async function detectChanges(
  rootPath: string,
  baseRef?: string,
  options: ChangeDetectorOptions = {}
): Promise<ChangeDetectionResult> {
  const discoverer = new PackageDiscoverer(rootPath, options);
  const open = options.openRepository ?? openGitRepository;

  return withRepository(rootPath, open, async (repo) => {
    const { packages: discovered } = await discoverer.discoverWith(repo);
    logger.debug(`Discovered ${discovered.length} package(s)`);

    const range = await resolveCommitRange(repo, baseRef);

    if (range.kind === 'full-rebuild') {
      logger.debug(`Full rebuild: ${range.reason}`);
      return {
        range,
        changedPaths: [],
        packages: allPackageNames(discovered),
        discovered,
      };
    }

    logger.debug(`Comparing ${range.base}..${range.head}`);
    const deltas = await repo.diffTrees(range.base, range.head);
    const changedPaths = collectCandidatePaths(deltas);

    return {
      range,
      changedPaths,
      packages: mapPathsToPackages(changedPaths, discovered),
      discovered,
    };
  });
}

/**
 * Names of the packages changed between `baseRef` (default: HEAD's parent) and HEAD
 */
export async function detectChangedPackages(
  rootPath: string,
  baseRef?: string,
  options?: ChangeDetectorOptions
): Promise<string[]> {
  const result = await detectChanges(rootPath, baseRef, options);
  return result.packages;
}

/**
 * Whether anything at or below `path` differs between `baseRef` and HEAD
 */
export async function hasPathChanged(
  rootPath: string,
  path: string,
  baseRef: string,
  options: Pick<ChangeDetectorOptions, 'openRepository'> = {}
): Promise<boolean> {
  const open = options.openRepository ?? openGitRepository;
  const target = normalizeRepoPath(path);

  return withRepository(rootPath, open, async (repo) => {
    const base = await repo.resolveCommit(baseRef);
    const head = await repo.headCommit();
    const deltas = await repo.diffTrees(base, head, target ? [target] : []);
    return deltas.length > 0;
  });
}
