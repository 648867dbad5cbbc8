/**
 * Tests for the Logger class
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger } from './logger.js';

describe('Logger', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  describe('constructor and configure', () => {
    it('should use default options when none provided', () => {
      const logger = new Logger();
      const options = logger.getOptions();

      expect(options.quiet).toBe(false);
      expect(options.verbose).toBe(false);
      expect(options.noColor).toBe(false);
      expect(options.timestamps).toBe(false);
    });

    it('should update options via configure', () => {
      const logger = new Logger({ verbose: true });
      logger.configure({ quiet: true });

      expect(logger.getOptions()).toMatchObject({ quiet: true, verbose: true });
    });
  });

  describe('log levels', () => {
    it('should write every level to stderr, never stdout', () => {
      const logger = new Logger({ noColor: true, verbose: true });

      logger.discovery('Scanning tree');
      logger.analysis('Comparing trees');
      logger.success('Done');
      logger.warning('Skipped directory');
      logger.error('Something failed');
      logger.debug('Debug info');

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy.mock.calls).toEqual([
        ['🔍 Scanning tree'],
        ['🔬 Comparing trees'],
        ['✓ Done'],
        ['⚠ Skipped directory'],
        ['✗ Something failed'],
        ['→ Debug info'],
      ]);
    });

    it('should color the prefix unless noColor is set', () => {
      const logger = new Logger();
      logger.success('Done');

      expect(consoleErrorSpy).toHaveBeenCalledWith('\x1b[32m✓\x1b[0m Done');
    });
  });

  describe('quiet mode', () => {
    it('should suppress all non-error messages in quiet mode', () => {
      const logger = new Logger({ quiet: true, noColor: true, verbose: true });

      logger.discovery('test');
      logger.analysis('test');
      logger.success('test');
      logger.warning('test');
      logger.debug('test');
      logger.listItem('test');

      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });

    it('should still show error messages in quiet mode', () => {
      const logger = new Logger({ quiet: true, noColor: true });

      logger.error('Critical error');

      expect(consoleErrorSpy).toHaveBeenCalledWith('✗ Critical error');
    });
  });

  describe('verbose mode', () => {
    it('should hide debug messages when verbose is false', () => {
      const logger = new Logger({ noColor: true, verbose: false });

      logger.debug('Debug info');

      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });
  });

  describe('timestamps', () => {
    it('should add timestamps when enabled', () => {
      const logger = new Logger({ noColor: true, timestamps: true });

      logger.success('Done');

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      const output = String(consoleErrorSpy.mock.calls[0]?.[0]);
      expect(output).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}.\d{3}Z\] ✓ Done$/);
    });
  });

  describe('section and info helpers', () => {
    it('should print section headers', () => {
      const logger = new Logger({ noColor: true });

      logger.section('Initializing');

      expect(consoleErrorSpy).toHaveBeenCalledWith('=== Initializing ===');
    });

    it('should print info key-value pairs', () => {
      const logger = new Logger({ noColor: true });

      logger.info('Packages', 12);

      expect(consoleErrorSpy).toHaveBeenCalledWith('  Packages: 12');
    });

    it('should respect indent level for list items', () => {
      const logger = new Logger({ noColor: true });

      logger.listItem('First');
      logger.listItem('Nested', 2);

      expect(consoleErrorSpy.mock.calls).toEqual([['• First'], ['    • Nested']]);
    });
  });
});
