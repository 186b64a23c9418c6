/**
 * `restage install` writes a git pre-commit hook that runs `restage run`.
 */

import fs from 'fs-extra';
import path from 'path';
import chalk from 'chalk';
import {
    GitVersionControl,
    execaExecutor,
    generatePreCommitHook,
    isGeneratedHook,
    EXIT_FAIL,
    EXIT_PASS,
} from '@restage/core';
import type { GeneratedHookFile } from '@restage/core';

export interface InstallOptions {
    force?: boolean;
    dryRun?: boolean;
}

export interface InstallDependencies {
    hooksDir?: () => Promise<string | null>;
}

/**
 * Prefer the project-local binary so the hook works without a global
 * install. Hooks run from the top of the work tree, so a relative path holds.
 */
export function resolveRunnerCommand(cwd: string): string[] {
    const localBin = path.join('node_modules', '.bin', 'restage');
    if (fs.existsSync(path.join(cwd, localBin))) {
        return [localBin, 'run'];
    }
    return ['restage', 'run'];
}

async function writeHook(target: string, hook: GeneratedHookFile, force: boolean): Promise<boolean> {
    if (!force && await fs.pathExists(target)) {
        const existing = await fs.readFile(target, 'utf-8');
        const reason = isGeneratedHook(existing) ? 'already installed' : 'a different hook exists';
        console.log(chalk.yellow(`  SKIP ${target} (${reason}, use --force to overwrite)`));
        return false;
    }

    await fs.ensureDir(path.dirname(target));
    await fs.writeFile(target, hook.content, 'utf-8');
    if (hook.executable) {
        await fs.chmod(target, 0o755);
    }
    console.log(chalk.green(`  CREATE ${target}`));
    console.log(chalk.dim(`         ${hook.description}`));
    return true;
}

export async function installCommand(
    cwd: string, options: InstallOptions = {}, deps: InstallDependencies = {}
): Promise<number> {
    const hooksDir = deps.hooksDir ?? (() => new GitVersionControl(cwd, execaExecutor).hooksDir());
    const dir = await hooksDir();
    if (!dir) {
        console.error(chalk.red('Error: not inside a git repository.'));
        process.exitCode = EXIT_FAIL;
        return EXIT_FAIL;
    }

    const hook = generatePreCommitHook(resolveRunnerCommand(cwd));
    const target = path.join(dir, hook.name);

    if (options.dryRun) {
        console.log(chalk.cyan('\nDry run: hook that would be written:\n'));
        console.log(chalk.bold(`  ${target}`));
        console.log(chalk.dim(hook.content.split('\n').map(line => `    ${line}`).join('\n')));
        return EXIT_PASS;
    }

    const written = await writeHook(target, hook, !!options.force);
    if (written) {
        console.log(chalk.green.bold('\nHook installed. It runs on every `git commit`.'));
    }
    return EXIT_PASS;
}
