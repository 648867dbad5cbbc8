/**
 * pkgdelta package-version command
 */

import { Command } from 'commander';
import { handleError } from '../../utils/errors.js';
import type { RecipeCommandOptions } from '../../types/index.js';
import { readConfig } from '../../core/services/config-manager.js';
import {
  createRecipeReader,
  formatVersion,
  resolveRecipePath,
  type RecipeReader,
} from '../../core/recipe/recipe-reader.js';

export interface RecipeCommandDependencies {
  recipeReader?: RecipeReader;
  /** Directory whose .pkgdelta.yaml supplies the recipe file name and shell */
  configRoot?: string;
}

export async function runPackageVersion(
  path: string,
  options: Partial<RecipeCommandOptions>,
  deps: RecipeCommandDependencies = {}
): Promise<string> {
  const config = await readConfig(deps.configRoot ?? process.cwd());
  const reader = deps.recipeReader ?? createRecipeReader({ static: options.static, shell: config.shell });

  const version = await reader.readVersion(resolveRecipePath(path, config.recipeFile));
  return formatVersion(version);
}

export const packageVersionCommand = new Command('package-version')
  .description('Print pkgver-pkgrel of a recipe')
  .argument('<path>', 'Recipe file or package directory')
  .option('--static', 'Parse plain assignments instead of sourcing the recipe', false)
  .addHelpText(
    'after',
    `
Examples:
  $ pkgdelta package-version packages/foo            Source packages/foo/PKGBUILD
  $ pkgdelta package-version foo/PKGBUILD --static   Read without running a shell
`
  )
  .action(async (path: string, options: Partial<RecipeCommandOptions>) => {
    try {
      console.log(await runPackageVersion(path, options));
    } catch (error) {
      handleError(error);
    }
  });
