/**
 * pkgdelta detect-changes command
 *
 * Prints the packages touched between a base ref and HEAD, for CI jobs that
 * rebuild only what changed.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import type { DetectChangesOptions, Package } from '../../types/index.js';
import type { RepositoryOpener } from '../../core/git/repository.js';
import { detectChanges } from '../../core/changes/change-detector.js';
import { PackageDiscoverer } from '../../core/packages/package-discoverer.js';
import { readConfig } from '../../core/services/config-manager.js';
import { parseFormat, renderIdentifiers } from '../output.js';

export interface DetectChangesDependencies {
  openRepository?: RepositoryOpener;
}

/**
 * Build the command's stdout without printing it
 */
export async function runDetectChanges(
  options: Partial<DetectChangesOptions>,
  deps: DetectChangesDependencies = {}
): Promise<string> {
  const rootPath = resolve(options.repoPath ?? '.');
  const config = await readConfig(rootPath);
  const format = parseFormat(options.format ?? config.format);

  const discoveryOptions = {
    recipeFile: config.recipeFile,
    excludeDirectories: config.excludeDirectories,
    excludePatterns: config.excludePatterns,
    openRepository: deps.openRepository,
  };

  let selected: Package[];

  if (options.all) {
    logger.discovery(`Listing every package in ${rootPath}`);
    const result = await new PackageDiscoverer(rootPath, discoveryOptions).discover();
    logger.debug(`Scanned ${result.summary.directoriesScanned} directories, skipped ${result.summary.skippedCount}`);
    if (logger.getOptions().verbose) {
      for (const [reason, count] of Object.entries(result.summary.skippedReasons)) {
        logger.listItem(`${reason}: ${count}`, 1);
      }
    }
    selected = result.packages;
  } else {
    logger.discovery(`Detecting changed packages in ${rootPath}`);
    const result = await detectChanges(rootPath, options.baseRef, discoveryOptions);

    if (result.range.kind === 'full-rebuild') {
      logger.warning(`No base commit (${result.range.reason}); treating every package as changed`);
    } else {
      logger.analysis(`Comparing ${result.range.base}..${result.range.head}`);
      logger.debug(`${result.changedPaths.length} changed path(s)`);
    }

    const changed = new Set(result.packages);
    selected = result.discovered.filter((pkg) => changed.has(pkg.name));
  }

  logger.success(`${selected.length} package(s) selected`);

  const identifiers = selected.map((pkg) => (options.paths ? pkg.path : pkg.name));
  return renderIdentifiers(identifiers, format);
}

export const detectChangesCommand = new Command('detect-changes')
  .description('Detect packages that changed between a base ref and HEAD')
  .option('-r, --repo-path <path>', 'Repository root', '.')
  .option('-b, --base-ref <ref>', 'Base commit or ref to compare against (defaults to HEAD^)')
  .option('-f, --format <format>', 'Output format: space or json (default from .pkgdelta.yaml, else space)')
  .option('-a, --all', 'List every package regardless of changes (full rebuild)', false)
  .option('-p, --paths', 'Print package paths instead of names', false)
  .addHelpText(
    'after',
    `
Examples:
  $ pkgdelta detect-changes                       Packages changed by the last commit
  $ pkgdelta detect-changes -b origin/main        Packages changed since origin/main
  $ pkgdelta detect-changes --paths -f json       Changed package paths as JSON
  $ pkgdelta detect-changes --all                 Every package

When HEAD has no parent and no --base-ref is given, every package is reported.
`
  )
  .action(async (options: Partial<DetectChangesOptions>) => {
    try {
      console.log(await runDetectChanges(options));
    } catch (error) {
      handleError(error);
    }
  });
