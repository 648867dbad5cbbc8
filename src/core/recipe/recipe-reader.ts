/**
 * Recipe readers
 *
 * A recipe is a shell-sourceable build description. Two readers extract its
 * `pkgver`, `pkgrel` and `pkgname`:
 * - ShellRecipeReader sources the file in a shell, so computed values resolve
 * - StaticRecipeReader scans plain `key=value` lines without running anything
 */

import { access, readFile } from 'node:fs/promises';
import { dirname, posix, resolve } from 'node:path';
import type { PackageVersion } from '../../types/index.js';
import { describeError, RecipeReadError } from '../../utils/errors.js';
import { CommandError, runCommand, type CommandRunner } from '../services/command-runner.js';
import { DEFAULT_RECIPE_FILE } from '../packages/package-discoverer.js';

export interface RecipeReader {
  readVersion(recipePath: string): Promise<PackageVersion>;
  readName(recipePath: string): Promise<string>;
}

/**
 * `pkgver-pkgrel`
 */
export function formatVersion(version: PackageVersion): string {
  return `${version.pkgver}-${version.pkgrel}`;
}

/**
 * Accept either a recipe file or the directory holding one
 */
export function resolveRecipePath(input: string, recipeFile: string = DEFAULT_RECIPE_FILE): string {
  const normalized = input.replace(/\\/g, '/');
  if (posix.basename(normalized) === recipeFile) {
    return input;
  }
  const trimmed = normalized.replace(/\/+$/, '');
  return trimmed ? `${trimmed}/${recipeFile}` : `/${recipeFile}`;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// SHELL READER
// ============================================================================

// The recipe path travels as $1, never spliced into the script text
const PRINT_VERSION = '. "$1" >/dev/null 2>&1 && printf \'%s\\n%s\\n\' "$pkgver" "$pkgrel"';
const PRINT_NAME = '. "$1" >/dev/null 2>&1 && printf \'%s\\n\' "$pkgname"';

export class ShellRecipeReader implements RecipeReader {
  constructor(
    private readonly shell: string = 'bash',
    private readonly runner: CommandRunner = runCommand
  ) {}

  private async source(recipePath: string, script: string): Promise<string[]> {
    const absolute = resolve(recipePath);
    if (!(await fileExists(absolute))) {
      throw new RecipeReadError(recipePath, 'recipe not found');
    }

    try {
      const { stdout } = await this.runner(this.shell, ['-c', script, 'pkgdelta', absolute], {
        cwd: dirname(absolute),
      });
      return stdout.split('\n').map((line) => line.trim());
    } catch (error) {
      const reason = error instanceof CommandError ? error.reason : describeError(error);
      throw new RecipeReadError(recipePath, `failed to source recipe: ${reason}`);
    }
  }

  async readVersion(recipePath: string): Promise<PackageVersion> {
    const [pkgver = '', pkgrel = ''] = await this.source(recipePath, PRINT_VERSION);

    if (!pkgver) throw new RecipeReadError(recipePath, 'pkgver is empty');
    if (!pkgrel) throw new RecipeReadError(recipePath, 'pkgrel is empty');

    return { pkgver, pkgrel };
  }

  async readName(recipePath: string): Promise<string> {
    const [pkgname = ''] = await this.source(recipePath, PRINT_NAME);

    if (!pkgname) throw new RecipeReadError(recipePath, 'pkgname is empty');

    return pkgname;
  }
}

// ============================================================================
// STATIC READER
// ============================================================================

/**
 * Value of `prefix=value`, trimmed, with one matching pair of quotes removed
 */
export function extractAssignmentValue(line: string, prefix: string): string {
  const value = line.slice(prefix.length).trim();

  if (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'")))
  ) {
    return value.slice(1, -1);
  }

  return value;
}

/**
 * Last plain assignment to each requested key; nothing is evaluated
 */
export function parseAssignments(content: string, keys: readonly string[]): Map<string, string> {
  const values = new Map<string, string>();

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    for (const key of keys) {
      const prefix = `${key}=`;
      if (line.startsWith(prefix)) {
        values.set(key, extractAssignmentValue(line, prefix));
        break;
      }
    }
  }

  return values;
}

export class StaticRecipeReader implements RecipeReader {
  private async read(recipePath: string, keys: readonly string[]): Promise<Map<string, string>> {
    let content: string;
    try {
      content = await readFile(recipePath, 'utf-8');
    } catch (error) {
      throw new RecipeReadError(recipePath, `failed to read recipe: ${describeError(error)}`);
    }
    return parseAssignments(content, keys);
  }

  async readVersion(recipePath: string): Promise<PackageVersion> {
    const values = await this.read(recipePath, ['pkgver', 'pkgrel']);
    const pkgver = values.get('pkgver');
    const pkgrel = values.get('pkgrel');

    if (pkgver === undefined) throw new RecipeReadError(recipePath, 'pkgver not found');
    if (pkgrel === undefined) throw new RecipeReadError(recipePath, 'pkgrel not found');

    return { pkgver, pkgrel };
  }

  async readName(recipePath: string): Promise<string> {
    const values = await this.read(recipePath, ['pkgname']);
    const pkgname = values.get('pkgname');

    if (pkgname === undefined) throw new RecipeReadError(recipePath, 'pkgname not found');

    return pkgname;
  }
}

/**
 * Reader for the CLI's `--static` switch
 */
export function createRecipeReader(options: { static?: boolean; shell?: string } = {}): RecipeReader {
  return options.static ? new StaticRecipeReader() : new ShellRecipeReader(options.shell);
}
