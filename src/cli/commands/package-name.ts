/**
 * pkgdelta package-name command
 */

import { Command } from 'commander';
import { handleError } from '../../utils/errors.js';
import type { RecipeCommandOptions } from '../../types/index.js';
import { readConfig } from '../../core/services/config-manager.js';
import { createRecipeReader, resolveRecipePath } from '../../core/recipe/recipe-reader.js';
import type { RecipeCommandDependencies } from './package-version.js';

export async function runPackageName(
  path: string,
  options: Partial<RecipeCommandOptions>,
  deps: RecipeCommandDependencies = {}
): Promise<string> {
  const config = await readConfig(deps.configRoot ?? process.cwd());
  const reader = deps.recipeReader ?? createRecipeReader({ static: options.static, shell: config.shell });

  return reader.readName(resolveRecipePath(path, config.recipeFile));
}

export const packageNameCommand = new Command('package-name')
  .description("Print a recipe's declared pkgname")
  .argument('<path>', 'Recipe file or package directory')
  .option('--static', 'Parse plain assignments instead of sourcing the recipe', false)
  .action(async (path: string, options: Partial<RecipeCommandOptions>) => {
    try {
      console.log(await runPackageName(path, options));
    } catch (error) {
      handleError(error);
    }
  });
