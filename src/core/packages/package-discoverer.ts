/**
 * PackageDiscoverer
 *
 * Finds every package in a package-build tree: registered submodules with a
 * recipe at their root, plus plain directories holding a recipe at most two
 * levels below the repository root. Path ownership in the change detector
 * depends on that bound.
 */

import { access, readdir, stat } from 'node:fs/promises';
import { basename, join, relative, resolve, sep } from 'node:path';
import ignoreModule from 'ignore';
const ignore = ignoreModule.default ?? ignoreModule;
type Ignore = ReturnType<typeof ignore>;
import type { DiscoveryResult, Package } from '../../types/index.js';
import { describeError, RepositoryError } from '../../utils/errors.js';
import logger from '../../utils/logger.js';
import { openGitRepository } from '../git/git-repository.js';
import { withRepository, type Repository, type RepositoryOpener } from '../git/repository.js';
import { compareNames, normalizeRepoPath, sortPackagesByName } from './package.js';

/**
 * Options for the PackageDiscoverer
 */
export interface PackageDiscovererOptions {
  /** Recipe file name looked up in candidate directories */
  recipeFile?: string;
  /** Extra top-level directory names to skip */
  excludeDirectories?: string[];
  /** Gitignore-style patterns matched against repository-relative directory paths */
  excludePatterns?: string[];
  /** Repository opener, replaced in tests */
  openRepository?: RepositoryOpener;
}

export const DEFAULT_RECIPE_FILE = 'PKGBUILD';

/**
 * Top-level directories that never hold packages: build output, dependency
 * caches, the build container and the published package repository
 */
export const EXCLUDED_DIRECTORIES: ReadonlySet<string> = new Set([
  'target',
  'node_modules',
  'build-container',
  'repo',
]);

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * A `.git` file (worktree/submodule pointer) or directory marks a separate checkout
 */
export async function hasRepositoryMarker(dirPath: string): Promise<boolean> {
  return fileExists(join(dirPath, '.git'));
}

/**
 * PackageDiscoverer class for walking a package-build tree
 */
export class PackageDiscoverer {
  private rootPath: string;
  private recipeFile: string;
  private excludeDirectories: Set<string>;
  private ig: Ignore | null;
  private openRepository: RepositoryOpener;
  private directoriesScanned = 0;
  private skippedCount = 0;
  private skippedReasons: Record<string, number> = {};

  constructor(rootPath: string, options: PackageDiscovererOptions = {}) {
    this.rootPath = resolve(rootPath);
    this.recipeFile = options.recipeFile ?? DEFAULT_RECIPE_FILE;
    this.excludeDirectories = new Set(options.excludeDirectories ?? []);
    this.openRepository = options.openRepository ?? openGitRepository;

    const patterns = options.excludePatterns ?? [];
    this.ig = patterns.length > 0 ? ignore().add(patterns) : null;
  }

  /**
   * Record a skipped directory with reason
   */
  private recordSkip(reason: string): void {
    this.skippedCount++;
    this.skippedReasons[reason] = (this.skippedReasons[reason] ?? 0) + 1;
  }

  private toRepoPath(absolutePath: string): string {
    return normalizeRepoPath(relative(this.rootPath, absolutePath).split(sep).join('/'));
  }

  private async hasRecipe(dirPath: string): Promise<boolean> {
    try {
      return (await stat(join(dirPath, this.recipeFile))).isFile();
    } catch {
      return false;
    }
  }

  /**
   * Check if a top-level directory name is noise
   */
  private shouldSkipDirectory(dirName: string): boolean {
    return (
      dirName.startsWith('.') ||
      EXCLUDED_DIRECTORIES.has(dirName) ||
      this.excludeDirectories.has(dirName)
    );
  }

  private isExcludedByPattern(repoPath: string): boolean {
    return this.ig !== null && this.ig.ignores(`${repoPath}/`);
  }

  private directoryPackage(dirPath: string): Package {
    return {
      name: basename(dirPath),
      path: this.toRepoPath(dirPath),
      recipePath: join(dirPath, this.recipeFile),
      isSubmodule: false,
    };
  }

  /**
   * Submodules with a recipe directly under their checkout path
   */
  private async findSubmodulePackages(repo: Repository): Promise<Package[]> {
    const packages: Package[] = [];

    for (const submodule of await repo.listSubmodules()) {
      const path = normalizeRepoPath(submodule.path);
      const fullPath = join(this.rootPath, ...path.split('/'));

      if (!(await this.hasRecipe(fullPath))) {
        // Not checked out, or a plain dependency checkout
        this.recordSkip('submodule-without-recipe');
        continue;
      }

      packages.push({
        name: submodule.name || path.split('/').pop() || 'unknown',
        path,
        recipePath: join(fullPath, this.recipeFile),
        isSubmodule: true,
      });
    }

    return packages;
  }

  /**
   * Plain directories with a recipe, searched at most two levels deep
   */
  private async findDirectoryPackages(): Promise<Package[]> {
    const packages: Package[] = [];

    let entries: string[];
    try {
      entries = (await readdir(this.rootPath)).sort(compareNames);
    } catch (error) {
      throw new RepositoryError(
        this.rootPath,
        `failed to read repository directory: ${describeError(error)}`
      );
    }

    for (const entry of entries) {
      const dirPath = join(this.rootPath, entry);
      if (!(await isDirectory(dirPath))) continue;
      this.directoriesScanned++;

      if (await hasRepositoryMarker(dirPath)) {
        this.recordSkip('submodule');
        continue;
      }

      if (this.shouldSkipDirectory(entry)) {
        this.recordSkip(`directory:${entry}`);
        continue;
      }

      if (this.isExcludedByPattern(this.toRepoPath(dirPath))) {
        this.recordSkip('pattern');
        continue;
      }

      if (await this.hasRecipe(dirPath)) {
        packages.push(this.directoryPackage(dirPath));
        continue;
      }

      // One level deeper, no further
      let children: string[];
      try {
        children = (await readdir(dirPath)).sort(compareNames);
      } catch (error) {
        logger.debug(`Skipping unreadable directory ${this.toRepoPath(dirPath)}: ${describeError(error)}`);
        this.recordSkip('error');
        continue;
      }

      for (const child of children) {
        const childPath = join(dirPath, child);
        if (!(await isDirectory(childPath))) continue;
        this.directoriesScanned++;

        if (await hasRepositoryMarker(childPath)) {
          this.recordSkip('submodule');
          continue;
        }

        if (this.isExcludedByPattern(this.toRepoPath(childPath))) {
          this.recordSkip('pattern');
          continue;
        }

        if (await this.hasRecipe(childPath)) {
          packages.push(this.directoryPackage(childPath));
        }
      }
    }

    return packages;
  }

  /**
   * Discover packages using an already-open repository handle
   */
  async discoverWith(repo: Repository): Promise<DiscoveryResult> {
    this.directoriesScanned = 0;
    this.skippedCount = 0;
    this.skippedReasons = {};

    const submodulePackages = await this.findSubmodulePackages(repo);
    const directoryPackages = await this.findDirectoryPackages();

    return {
      packages: sortPackagesByName([...submodulePackages, ...directoryPackages]),
      summary: {
        submodulePackages: submodulePackages.length,
        directoryPackages: directoryPackages.length,
        directoriesScanned: this.directoriesScanned,
        skippedCount: this.skippedCount,
        skippedReasons: this.skippedReasons,
      },
      rootPath: this.rootPath,
    };
  }

  /**
   * Open the repository at the root, discover, and release the handle
   */
  async discover(): Promise<DiscoveryResult> {
    return withRepository(this.rootPath, this.openRepository, (repo) => this.discoverWith(repo));
  }
}

/**
 * Convenience function returning the name-sorted package list
 */
export async function discoverPackages(
  rootPath: string,
  options?: PackageDiscovererOptions
): Promise<Package[]> {
  const discoverer = new PackageDiscoverer(rootPath, options);
  const result = await discoverer.discover();
  return result.packages;
}
