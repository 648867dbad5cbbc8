/**
 * Package path helpers
 *
 * A package owns every repository path that equals its `path` or sits below it.
 * Matching is done on whole segments, so `core` never owns `core-extra/PKGBUILD`.
 */

import type { Package } from '../../types/index.js';

/**
 * Normalize a repository-relative path: forward slashes, no leading `./`,
 * no trailing slash.
 */
export function normalizeRepoPath(path: string): string {
  let normalized = path.replace(/\\/g, '/');
  while (normalized.startsWith('./')) {
    normalized = normalized.slice(2);
  }
  return normalized.replace(/\/+$/, '');
}

/**
 * Check whether `candidate` lies at or below `packagePath`
 */
export function isPathOwnedBy(candidate: string, packagePath: string): boolean {
  const owner = normalizeRepoPath(packagePath);
  if (!owner) return false;

  const path = normalizeRepoPath(candidate);
  return path === owner || path.startsWith(`${owner}/`);
}

/**
 * Return the first package, in the given order, that owns `candidate`
 */
export function findOwningPackage(candidate: string, packages: readonly Package[]): Package | undefined {
  return packages.find((pkg) => isPathOwnedBy(candidate, pkg.path));
}

/**
 * Plain code-unit ordering, independent of locale
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortPackagesByName(packages: Package[]): Package[] {
  // Array#sort is stable, so duplicate names keep their discovery order
  return packages.sort((a, b) => compareNames(a.name, b.name));
}
