/**
 * Core type definitions for pkgdelta
 */

// Package model
export interface Package {
  /** Directory name, or the submodule's declared name */
  name: string;
  /** Forward-slash path relative to the repository root; the ownership key */
  path: string;
  /** Absolute path to the recipe file */
  recipePath: string;
  isSubmodule: boolean;
}

export interface DiscoverySummary {
  submodulePackages: number;
  directoryPackages: number;
  directoriesScanned: number;
  skippedCount: number;
  skippedReasons: Record<string, number>;
}

export interface DiscoveryResult {
  packages: Package[];
  summary: DiscoverySummary;
  rootPath: string;
}

// Git types
export interface SubmoduleEntry {
  name: string;
  /** Path relative to the repository root, as declared in .gitmodules */
  path: string;
}

export type TreeDeltaStatus = 'added' | 'modified' | 'deleted' | 'renamed';

export interface TreeDelta {
  status: TreeDeltaStatus;
  /** New-side path (for deletions, the removed path) */
  path: string;
  /** Old-side path, present for renames and copies */
  oldPath?: string;
}

export type CommitRange =
  | { kind: 'range'; base: string; head: string }
  | { kind: 'full-rebuild'; reason: string };

export interface ChangeDetectionResult {
  range: CommitRange;
  /** Every candidate path collected from the diff, in diff order */
  changedPaths: string[];
  /** Sorted, deduplicated changed package names */
  packages: string[];
  /** Discovery result the names were matched against */
  discovered: Package[];
}

// Recipe types
export interface PackageVersion {
  pkgver: string;
  pkgrel: string;
}

// Configuration types
export type OutputFormat = 'space' | 'json';

export interface PkgDeltaConfig {
  recipeFile: string;
  excludeDirectories: string[];
  excludePatterns: string[];
  shell: string;
  format: OutputFormat;
}

// CLI option types
export interface GlobalOptions {
  quiet: boolean;
  verbose: boolean;
  noColor: boolean;
}

export interface DetectChangesOptions extends GlobalOptions {
  repoPath: string;
  baseRef?: string;
  format?: string;
  all: boolean;
  paths: boolean;
}

export interface ListPackagesOptions extends GlobalOptions {
  repoPath: string;
  versions: boolean;
  paths: boolean;
}

export interface RecipeCommandOptions extends GlobalOptions {
  static: boolean;
}

export interface InitOptions extends GlobalOptions {
  repoPath: string;
  force: boolean;
}
