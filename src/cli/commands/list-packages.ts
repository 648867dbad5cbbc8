/**
 * pkgdelta list-packages command
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { logger } from '../../utils/logger.js';
import { describeError, handleError } from '../../utils/errors.js';
import type { ListPackagesOptions } from '../../types/index.js';
import type { RepositoryOpener } from '../../core/git/repository.js';
import { discoverPackages } from '../../core/packages/package-discoverer.js';
import { readConfig } from '../../core/services/config-manager.js';
import { formatVersion, ShellRecipeReader, type RecipeReader } from '../../core/recipe/recipe-reader.js';

export interface ListPackagesDependencies {
  openRepository?: RepositoryOpener;
  recipeReader?: RecipeReader;
}

/**
 * One line per package, in discovery order
 */
export async function runListPackages(
  options: Partial<ListPackagesOptions>,
  deps: ListPackagesDependencies = {}
): Promise<string[]> {
  const rootPath = resolve(options.repoPath ?? '.');
  const config = await readConfig(rootPath);

  const packages = await discoverPackages(rootPath, {
    recipeFile: config.recipeFile,
    excludeDirectories: config.excludeDirectories,
    excludePatterns: config.excludePatterns,
    openRepository: deps.openRepository,
  });
  logger.debug(`Found ${packages.length} package(s)`);

  const reader = deps.recipeReader ?? new ShellRecipeReader(config.shell);
  const lines: string[] = [];

  for (const pkg of packages) {
    const identifier = options.paths ? pkg.path : pkg.name;

    if (!options.versions) {
      lines.push(identifier);
      continue;
    }

    try {
      const version = await reader.readVersion(pkg.recipePath);
      lines.push(`${identifier}: ${formatVersion(version)}`);
    } catch (error) {
      // An unreadable recipe does not fail the listing
      logger.debug(`${pkg.name}: ${describeError(error)}`);
      lines.push(`${identifier}: <version unknown>`);
    }
  }

  return lines;
}

export const listPackagesCommand = new Command('list-packages')
  .description('List all packages in the repository')
  .option('-r, --repo-path <path>', 'Repository root', '.')
  .option('--versions', 'Show pkgver-pkgrel read from each recipe', false)
  .option('-p, --paths', 'Print package paths instead of names', false)
  .addHelpText(
    'after',
    `
Examples:
  $ pkgdelta list-packages                 Package names
  $ pkgdelta list-packages --versions      Names with versions
  $ pkgdelta list-packages -p -r ../tree   Paths in another checkout
`
  )
  .action(async (options: Partial<ListPackagesOptions>) => {
    try {
      const lines = await runListPackages(options);
      if (lines.length > 0) {
        console.log(lines.join('\n'));
      }
    } catch (error) {
      handleError(error);
    }
  });
