/**
 * Tests for pkgdelta init command
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, readFile, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { configureLogger } from '../../utils/logger.js';
import { readConfig } from '../../core/services/config-manager.js';
import { initCommand, runInit } from './init.js';

describe('init command', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    configureLogger({ quiet: true });
    testDir = join(tmpdir(), `pkgdelta-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    configPath = join(testDir, '.pkgdelta.yaml');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should have --repo-path and --force options', () => {
    expect(initCommand.name()).toBe('init');
    expect(initCommand.options.find(o => o.long === '--force')?.defaultValue).toBe(false);
    expect(initCommand.options.find(o => o.long === '--repo-path')?.defaultValue).toBe('.');
  });

  it('should write the default configuration', async () => {
    expect(await runInit({ repoPath: testDir }, { interactive: false })).toBe(configPath);

    expect(await readConfig(testDir)).toEqual({
      recipeFile: 'PKGBUILD',
      excludeDirectories: [],
      excludePatterns: [],
      shell: 'bash',
      format: 'space',
    });
  });

  it('should refuse to overwrite without a terminal', async () => {
    await writeFile(configPath, 'shell: sh\n');

    await expect(runInit({ repoPath: testDir }, { interactive: false })).rejects.toHaveProperty(
      'code',
      'CONFIG_EXISTS'
    );
    expect(await readFile(configPath, 'utf-8')).toBe('shell: sh\n');
  });

  it('should keep the file when the user declines', async () => {
    await writeFile(configPath, 'shell: sh\n');
    const confirmOverwrite = vi.fn(async () => false);

    expect(await runInit({ repoPath: testDir }, { interactive: true, confirmOverwrite })).toBeNull();
    expect(confirmOverwrite).toHaveBeenCalledWith('Overwrite existing configuration?');
    expect(await readFile(configPath, 'utf-8')).toBe('shell: sh\n');
  });

  it('should overwrite with --force without asking', async () => {
    await writeFile(configPath, 'shell: sh\n');
    const confirmOverwrite = vi.fn(async () => false);

    await runInit({ repoPath: testDir, force: true }, { interactive: true, confirmOverwrite });

    expect(confirmOverwrite).not.toHaveBeenCalled();
    expect((await readConfig(testDir)).shell).toBe('bash');
  });
});
