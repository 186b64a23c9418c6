import chalk from 'chalk';
import fs from 'fs';
import path from 'path';
import { execFileSync } from 'child_process';
import { loadConfig, EXIT_CONFIG_ERROR, EXIT_FAIL, EXIT_PASS } from '@restage/core';
import type { Config } from '@restage/core';

export interface ToolCheck {
    role: string;
    command: string;
    paths: string[];
}

export interface ConfigFileCheck {
    formatter: string;
    file: string;
    present: boolean;
}

export interface DoctorDependencies {
    /** Every match for a command on PATH, first one active */
    lookup?: (command: string) => string[];
}

function runText(command: string, args: string[]): string {
    try {
        return execFileSync(command, args, { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'ignore'] }).trim();
    } catch {
        return '';
    }
}

export function listToolPaths(command: string): string[] {
    // Explicit paths are not looked up
    if (command.includes('/') || command.includes('\\')) {
        return fs.existsSync(command) ? [command] : [];
    }
    const output = process.platform === 'win32'
        ? runText('where', [command])
        : runText('which', ['-a', command]);
    return output.split(/\r?\n/).map((line) => line.trim()).filter(Boolean);
}

export function collectToolChecks(config: Config, lookup: (command: string) => string[]): ToolCheck[] {
    const tools: Array<{ role: string; command: string }> = [{ role: 'git', command: config.git.command }];
    if (config.audit.enabled) {
        tools.push({ role: 'audit', command: config.audit.command });
    }
    for (const [tag, formatter] of Object.entries(config.formatters)) {
        tools.push({ role: `.${tag} formatter`, command: formatter.command });
    }
    return tools.map(tool => ({ ...tool, paths: Array.from(new Set(lookup(tool.command))) }));
}

export function collectConfigFileChecks(config: Config, cwd: string): ConfigFileCheck[] {
    const checks: ConfigFileCheck[] = [];
    for (const [tag, formatter] of Object.entries(config.formatters)) {
        if (formatter.config_file) {
            checks.push({
                formatter: tag,
                file: formatter.config_file,
                present: fs.existsSync(path.resolve(cwd, formatter.config_file)),
            });
        }
    }
    return checks;
}

export async function doctorCommand(cwd: string, deps: DoctorDependencies = {}): Promise<number> {
    console.log(chalk.bold.cyan('\nrestage doctor\n'));

    const loaded = await loadConfig(cwd);
    if (!loaded.ok) {
        console.error(chalk.red(`Error: ${loaded.message}`));
        process.exitCode = EXIT_CONFIG_ERROR;
        return EXIT_CONFIG_ERROR;
    }
    console.log(chalk.dim(`  Config: ${loaded.source ?? 'built-in defaults'}\n`));

    const tools = collectToolChecks(loaded.config, deps.lookup ?? listToolPaths);
    const configFiles = collectConfigFileChecks(loaded.config, cwd);
    let problems = 0;

    console.log(chalk.bold('Tools on PATH'));
    for (const tool of tools) {
        const [active] = tool.paths;
        if (!active) {
            problems++;
            console.log(`  ${chalk.red('✘')} ${tool.role}: ${tool.command} ${chalk.red('not found')}`);
            continue;
        }
        console.log(`  ${chalk.green('✓')} ${tool.role}: ${active}`);
        if (tool.paths.length > 1) {
            console.log(chalk.dim(`      also on PATH: ${tool.paths.slice(1).join(', ')}`));
        }
    }

    if (configFiles.length > 0) {
        console.log(chalk.bold('\nFormatter config files'));
        for (const check of configFiles) {
            if (check.present) {
                console.log(`  ${chalk.green('✓')} .${check.formatter}: ${check.file}`);
            } else {
                problems++;
                console.log(`  ${chalk.red('✘')} .${check.formatter}: ${check.file} ${chalk.red('missing')}`);
            }
        }
    }

    console.log('');
    if (problems > 0) {
        console.log(chalk.yellow(`${problems} problem(s) found. Commits will fail until they are fixed.\n`));
        process.exitCode = EXIT_FAIL;
        return EXIT_FAIL;
    }
    console.log(chalk.green('Everything the hook needs is in place.\n'));
    return EXIT_PASS;
}
