/**
 * pkgdelta init command
 *
 * Writes .pkgdelta.yaml with the default settings at the repository root.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { confirm } from '@inquirer/prompts';
import { logger } from '../../utils/logger.js';
import { errors, handleError } from '../../utils/errors.js';
import {
  DEFAULT_CONFIG,
  configExists,
  getConfigPath,
  readConfig,
  writeConfig,
} from '../../core/services/config-manager.js';
import type { InitOptions } from '../../types/index.js';

export interface InitDependencies {
  /** Whether prompting is possible; defaults to stdin being a TTY */
  interactive?: boolean;
  confirmOverwrite?: (message: string) => Promise<boolean>;
}

function promptOverwrite(message: string): Promise<boolean> {
  return confirm({ message, default: false });
}

/**
 * Returns the written path, or null when the user declined to overwrite
 */
export async function runInit(
  options: Partial<InitOptions>,
  deps: InitDependencies = {}
): Promise<string | null> {
  const rootPath = resolve(options.repoPath ?? '.');
  const configPath = getConfigPath(rootPath);
  const force = options.force ?? false;

  logger.section('Initializing pkgdelta');

  if ((await configExists(rootPath)) && !force) {
    logger.warning(`${configPath} already exists`);

    const interactive = deps.interactive ?? Boolean(process.stdin.isTTY);
    if (!interactive) {
      throw errors.configExists(configPath);
    }

    const overwrite = await (deps.confirmOverwrite ?? promptOverwrite)('Overwrite existing configuration?');
    if (!overwrite) {
      logger.info('Aborted', 'Use --force to overwrite without prompting');
      return null;
    }
  }

  await writeConfig(rootPath, { ...DEFAULT_CONFIG });
  logger.success(`Wrote ${configPath}`);

  const written = await readConfig(rootPath);
  logger.info('Recipe file', written.recipeFile);
  logger.info('Shell', written.shell);
  logger.info('Format', written.format);

  return configPath;
}

export const initCommand = new Command('init')
  .description('Create .pkgdelta.yaml with default settings')
  .option('-r, --repo-path <path>', 'Repository root', '.')
  .option('--force', 'Overwrite existing configuration', false)
  .addHelpText(
    'after',
    `
Examples:
  $ pkgdelta init            Write .pkgdelta.yaml in the current directory
  $ pkgdelta init --force    Overwrite an existing file without asking
`
  )
  .action(async (options: Partial<InitOptions>) => {
    try {
      await runInit(options);
    } catch (error) {
      handleError(error);
    }
  });
