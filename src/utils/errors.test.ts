/**
 * Tests for pkgdelta error classes
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  CommitResolutionError,
  PkgDeltaError,
  RecipeReadError,
  RefResolutionError,
  RepositoryError,
  errors,
  formatError,
  handleError,
  isPkgDeltaError,
} from './errors.js';

describe('errors', () => {
  describe('PkgDeltaError', () => {
    it('should format without color', () => {
      const error = new PkgDeltaError('Broken', 'UNKNOWN_ERROR', 'Try again');

      expect(error.format(false)).toBe('Error [UNKNOWN_ERROR]: Broken\n\nSuggestion: Try again');
    });

    it('should omit the suggestion block when there is none', () => {
      const error = new PkgDeltaError('Broken', 'UNKNOWN_ERROR');

      expect(error.format(false)).toBe('Error [UNKNOWN_ERROR]: Broken');
    });

    it('should wrap the label in ANSI codes with color', () => {
      const error = new PkgDeltaError('Broken', 'UNKNOWN_ERROR');

      expect(error.format(true)).toBe('\x1b[31mError [UNKNOWN_ERROR]:\x1b[0m Broken');
    });
  });

  describe('domain errors', () => {
    it('should name the repository path', () => {
      const error = new RepositoryError('/srv/tree', 'not a git working copy');

      expect(error.code).toBe('REPOSITORY_ERROR');
      expect(error.subject).toBe('/srv/tree');
      expect(error.message).toBe('Failed to open repository at /srv/tree: not a git working copy');
      expect(error).toBeInstanceOf(PkgDeltaError);
    });

    it('should name the unresolvable ref', () => {
      const error = new RefResolutionError('no-such-branch');

      expect(error.code).toBe('REF_RESOLUTION_ERROR');
      expect(error.message).toBe('Failed to parse base ref: no-such-branch');
    });

    it('should explain an unborn HEAD', () => {
      const error = new CommitResolutionError('HEAD');

      expect(error.code).toBe('COMMIT_RESOLUTION_ERROR');
      expect(error.suggestion).toContain('no commits yet');
    });

    it('should put the recipe path after the reason', () => {
      const error = new RecipeReadError('/tree/foo/PKGBUILD', 'pkgver is empty');

      expect(error.message).toBe('pkgver is empty (/tree/foo/PKGBUILD)');
      expect(error.code).toBe('RECIPE_READ_ERROR');
    });
  });

  describe('factory', () => {
    it('should build an unknown format error', () => {
      const error = errors.unknownFormat('xml');

      expect(error.code).toBe('UNKNOWN_FORMAT');
      expect(error.message).toBe('Unknown format: xml');
    });

    it('should wrap non-pkgdelta errors', () => {
      expect(formatError(new Error('boom'), false)).toBe(
        'Error [UNKNOWN_ERROR]: An unexpected error occurred: boom'
      );
      expect(formatError('plain string', false)).toBe(
        'Error [UNKNOWN_ERROR]: An unexpected error occurred: plain string'
      );
    });
  });

  describe('isPkgDeltaError', () => {
    it('should narrow subclasses and reject plain errors', () => {
      expect(isPkgDeltaError(new RefResolutionError('x'))).toBe(true);
      expect(isPkgDeltaError(new Error('x'))).toBe(false);
      expect(isPkgDeltaError(null)).toBe(false);
    });
  });

  describe('handleError', () => {
    afterEach(() => {
      process.exitCode = undefined;
      vi.restoreAllMocks();
    });

    it('should print to stderr and set a failing exit code', () => {
      const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      handleError(errors.configExists('/tree/.pkgdelta.yaml'));

      expect(process.exitCode).toBe(1);
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      expect(String(consoleErrorSpy.mock.calls[0]?.[0])).toContain(
        'Configuration already exists at /tree/.pkgdelta.yaml'
      );
    });
  });
});
