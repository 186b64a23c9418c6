#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { EXIT_INTERNAL_ERROR } from '@restage/core';
import { runCommand, type RunOptions } from './commands/run.js';
import { installCommand, type InstallOptions } from './commands/install.js';
import { doctorCommand } from './commands/doctor.js';
import { getCliVersion } from './utils/cli-version.js';

const program = new Command();

program
    .name('restage')
    .description('Pre-commit hook: audit dependencies, format staged files and re-stage them')
    .version(getCliVersion());

program
    .command('run', { isDefault: true })
    .description('Audit, then format and re-stage every staged file (the pre-commit protocol)')
    .option('--verbose', 'Log every command and its exit code')
    .option('-c, --config <path>', 'Path to a restage.yml other than the one in the repository root')
    .addHelpText('after', `
Exit status is 0 when every step passes, otherwise the exit code of the
first failing tool (2 for a configuration error).

Examples:
  $ restage                            # what the installed hook runs
  $ restage run --verbose              # show each command as it runs
    `)
    .action(async (options: RunOptions) => {
        await runCommand(process.cwd(), options);
    });

program
    .command('install')
    .description('Install restage as the git pre-commit hook')
    .option('-f, --force', 'Overwrite an existing pre-commit hook')
    .option('--dry-run', 'Show the hook without writing it')
    .action(async (options: InstallOptions) => {
        await installCommand(process.cwd(), options);
    });

program
    .command('doctor')
    .description('Check that git, the auditor and the formatters resolve on PATH')
    .action(async () => {
        await doctorCommand(process.cwd());
    });

program.parseAsync().catch((error: unknown) => {
    const msg = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`\n❌ FATAL ERROR: ${msg}`));
    process.exitCode = EXIT_INTERNAL_ERROR;
});
