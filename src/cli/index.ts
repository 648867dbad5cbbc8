#!/usr/bin/env node

/**
 * pkgdelta CLI entry point
 *
 * Finds the packages of a package-build tree and which of them changed
 * between two commits.
 */

import { Command } from 'commander';
import { detectChangesCommand } from './commands/detect-changes.js';
import { listPackagesCommand } from './commands/list-packages.js';
import { packageVersionCommand } from './commands/package-version.js';
import { packageNameCommand } from './commands/package-name.js';
import { initCommand } from './commands/init.js';
import { configureLogger } from '../utils/logger.js';

const program = new Command();

// Hook to configure logger before any command runs
program.hook('preAction', (thisCommand) => {
  const opts = thisCommand.opts();
  configureLogger({
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    noColor: opts.color === false,
    timestamps: process.env.CI === 'true' || opts.color === false,
  });
});

program
  .name('pkgdelta')
  .description('Package repository tooling: discover packages and detect which ones changed')
  .version('0.1.0')
  .option('-q, --quiet', 'Minimal output (errors only)', false)
  .option('-v, --verbose', 'Show debug information', false)
  .option('--no-color', 'Disable colored output (also enables timestamps)')
  .addHelpText(
    'after',
    `
Results go to stdout; progress and diagnostics go to stderr.

Typical CI use:
  $ for pkg in $(pkgdelta -q detect-changes --paths); do
      (cd "$pkg" && makepkg)
    done

Layout:
  <repo>/
  ├── .pkgdelta.yaml       optional settings (pkgdelta init)
  ├── foo/PKGBUILD         package "foo"
  ├── group/bar/PKGBUILD   package "bar"
  └── vendored/ (submodule with PKGBUILD at its root)
`
  );

program.addCommand(detectChangesCommand);
program.addCommand(listPackagesCommand);
program.addCommand(packageVersionCommand);
program.addCommand(packageNameCommand);
program.addCommand(initCommand);

await program.parseAsync();
