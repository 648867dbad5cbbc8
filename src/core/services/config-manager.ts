/**
 * Configuration management service
 *
 * Handles reading/writing .pkgdelta.yaml at the repository root
 */

import { access, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import YAML from 'yaml';
import type { OutputFormat, PkgDeltaConfig } from '../../types/index.js';
import { describeError, errors } from '../../utils/errors.js';

export const CONFIG_FILE_NAME = '.pkgdelta.yaml';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['space', 'json'];

export const DEFAULT_CONFIG: Readonly<PkgDeltaConfig> = {
  recipeFile: 'PKGBUILD',
  excludeDirectories: [],
  excludePatterns: [],
  shell: 'bash',
  format: 'space',
};

/**
 * Check if a file exists
 */
async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function getConfigPath(rootPath: string): string {
  return join(rootPath, CONFIG_FILE_NAME);
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Validate parsed YAML and merge it over the defaults.
 * Unknown keys are ignored; known keys with the wrong type are rejected.
 */
export function parseConfig(raw: unknown, configPath: string): PkgDeltaConfig {
  const config: PkgDeltaConfig = {
    ...DEFAULT_CONFIG,
    excludeDirectories: [...DEFAULT_CONFIG.excludeDirectories],
    excludePatterns: [...DEFAULT_CONFIG.excludePatterns],
  };

  // An empty file parses to null
  if (raw === null || raw === undefined) {
    return config;
  }

  if (!isRecord(raw)) {
    throw errors.invalidConfig(configPath, 'expected a mapping at the top level');
  }

  const { recipeFile, excludeDirectories, excludePatterns, shell, format } = raw;

  if (recipeFile !== undefined) {
    if (typeof recipeFile !== 'string' || !recipeFile.trim() || recipeFile.includes('/')) {
      throw errors.invalidConfig(configPath, 'recipeFile must be a plain file name');
    }
    config.recipeFile = recipeFile;
  }

  if (excludeDirectories !== undefined) {
    if (!isStringArray(excludeDirectories)) {
      throw errors.invalidConfig(configPath, 'excludeDirectories must be a list of strings');
    }
    config.excludeDirectories = excludeDirectories;
  }

  if (excludePatterns !== undefined) {
    if (!isStringArray(excludePatterns)) {
      throw errors.invalidConfig(configPath, 'excludePatterns must be a list of strings');
    }
    config.excludePatterns = excludePatterns;
  }

  if (shell !== undefined) {
    if (typeof shell !== 'string' || !shell.trim()) {
      throw errors.invalidConfig(configPath, 'shell must be a non-empty string');
    }
    config.shell = shell;
  }

  if (format !== undefined) {
    if (typeof format !== 'string' || !isOutputFormat(format)) {
      throw errors.invalidConfig(configPath, `format must be one of: ${OUTPUT_FORMATS.join(', ')}`);
    }
    config.format = format;
  }

  return config;
}

/**
 * Read .pkgdelta.yaml, falling back to the defaults when it is absent
 */
export async function readConfig(rootPath: string): Promise<PkgDeltaConfig> {
  const configPath = getConfigPath(rootPath);

  if (!(await fileExists(configPath))) {
    return parseConfig(null, configPath);
  }

  let raw: unknown;
  try {
    raw = YAML.parse(await readFile(configPath, 'utf-8'));
  } catch (error) {
    throw errors.invalidConfig(configPath, describeError(error));
  }

  return parseConfig(raw, configPath);
}

/**
 * Write .pkgdelta.yaml
 */
export async function writeConfig(rootPath: string, config: PkgDeltaConfig): Promise<string> {
  const configPath = getConfigPath(rootPath);
  await writeFile(configPath, YAML.stringify(config), 'utf-8');
  return configPath;
}

/**
 * Check if .pkgdelta.yaml already exists
 */
export async function configExists(rootPath: string): Promise<boolean> {
  return fileExists(getConfigPath(rootPath));
}
