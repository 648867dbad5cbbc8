/**
 * Tests for pkgdelta list-packages command
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { PackageVersion } from '../../types/index.js';
import { RecipeReadError } from '../../utils/errors.js';
import { configureLogger } from '../../utils/logger.js';
import { FakeRepository } from '../../core/git/repository.test-helpers.js';
import type { RecipeReader } from '../../core/recipe/recipe-reader.js';
import { listPackagesCommand, runListPackages } from './list-packages.js';

class TableReader implements RecipeReader {
  constructor(private readonly versions: Record<string, PackageVersion>) {}

  async readVersion(recipePath: string): Promise<PackageVersion> {
    const version = this.versions[recipePath];
    if (!version) throw new RecipeReadError(recipePath, 'pkgver is empty');
    return version;
  }

  async readName(recipePath: string): Promise<string> {
    throw new RecipeReadError(recipePath, 'pkgname is empty');
  }
}

describe('list-packages command', () => {
  describe('command configuration', () => {
    it('should have correct name and options', () => {
      expect(listPackagesCommand.name()).toBe('list-packages');
      const longs = listPackagesCommand.options.map(o => o.long);
      expect(longs).toEqual(['--repo-path', '--versions', '--paths']);
    });
  });

  describe('runListPackages', () => {
    let testDir: string;
    let repo: FakeRepository;

    beforeEach(async () => {
      configureLogger({ quiet: true });
      testDir = join(tmpdir(), `pkgdelta-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      for (const dir of ['foo', join('group', 'bar')]) {
        await mkdir(join(testDir, dir), { recursive: true });
        await writeFile(join(testDir, dir, 'PKGBUILD'), 'pkgver=1.0\npkgrel=2\n');
      }
      repo = new FakeRepository(testDir);
    });

    afterEach(async () => {
      await rm(testDir, { recursive: true, force: true });
    });

    it('should list names in discovery order', async () => {
      expect(await runListPackages({ repoPath: testDir }, { openRepository: repo.opener() })).toEqual([
        'bar',
        'foo',
      ]);
    });

    it('should list paths', async () => {
      expect(
        await runListPackages({ repoPath: testDir, paths: true }, { openRepository: repo.opener() })
      ).toEqual(['group/bar', 'foo']);
    });

    it('should show versions and mark unreadable ones unknown', async () => {
      const reader = new TableReader({
        [join(testDir, 'foo', 'PKGBUILD')]: { pkgver: '1.0', pkgrel: '2' },
      });

      const lines = await runListPackages(
        { repoPath: testDir, versions: true },
        { openRepository: repo.opener(), recipeReader: reader }
      );

      expect(lines).toEqual(['bar: <version unknown>', 'foo: 1.0-2']);
    });
  });
});
