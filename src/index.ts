/**
 * pkgdelta library entry point
 */

export type * from './types/index.js';

export {
  PkgDeltaError,
  RepositoryError,
  RefResolutionError,
  CommitResolutionError,
  RecipeReadError,
  isPkgDeltaError,
  formatError,
} from './utils/errors.js';
export type { ErrorCode } from './utils/errors.js';

export { Logger, logger, configureLogger } from './utils/logger.js';
export type { LoggerOptions } from './utils/logger.js';

export {
  PackageDiscoverer,
  discoverPackages,
  DEFAULT_RECIPE_FILE,
  EXCLUDED_DIRECTORIES,
} from './core/packages/package-discoverer.js';
export type { PackageDiscovererOptions } from './core/packages/package-discoverer.js';
export { isPathOwnedBy, findOwningPackage, normalizeRepoPath } from './core/packages/package.js';

export {
  detectChanges,
  detectChangedPackages,
  hasPathChanged,
  resolveCommitRange,
} from './core/changes/change-detector.js';
export type { ChangeDetectorOptions } from './core/changes/change-detector.js';

export { GitRepository, openGitRepository } from './core/git/git-repository.js';
export { withRepository } from './core/git/repository.js';
export type { Repository, RepositoryOpener } from './core/git/repository.js';

export {
  ShellRecipeReader,
  StaticRecipeReader,
  createRecipeReader,
  formatVersion,
  resolveRecipePath,
} from './core/recipe/recipe-reader.js';
export type { RecipeReader } from './core/recipe/recipe-reader.js';

export { readConfig, writeConfig, configExists, DEFAULT_CONFIG, CONFIG_FILE_NAME } from './core/services/config-manager.js';
