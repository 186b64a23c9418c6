import chalk from 'chalk';
import {
    HookRunner,
    Logger,
    loadConfig,
    createCollaborators,
    EXIT_CONFIG_ERROR,
    EXIT_INTERNAL_ERROR,
} from '@restage/core';
import type { FailureKind, HookCollaborators, HookFailure } from '@restage/core';

export interface RunOptions {
    verbose?: boolean;
    config?: string;
}

/** Overrides for tests; production wiring spawns real tools. */
export interface RunDependencies {
    collaborators?: HookCollaborators;
    echo?: (line: string) => void;
}

const HINTS: Record<FailureKind, string> = {
    audit: 'Resolve the vulnerable dependencies reported above, then commit again.',
    enumeration: 'Run restage from inside a git work tree.',
    config: 'Check the formatter config_file in restage.yml.',
    check: 'Format the file (and add any required license header), then commit again.',
    write: 'The formatter could not rewrite the file; see its output above.',
    stage: 'git could not re-stage the file; see its output above.',
};

function reportFailure(failure: HookFailure): void {
    const target = failure.file ? ` for ${failure.file}` : '';
    Logger.error(chalk.bold(`✖ ${failure.kind} failed${target} (exit ${failure.exitCode})`));
    Logger.error(failure.message);
    console.error(chalk.dim(`  ${HINTS[failure.kind]}`));
}

/**
 * Run the pre-commit protocol in `cwd` and set the process exit code to the
 * first failing tool's code.
 */
export async function runCommand(cwd: string, options: RunOptions = {}, deps: RunDependencies = {}): Promise<number> {
    try {
        const loaded = await loadConfig(cwd, options.config);
        if (!loaded.ok) {
            console.error(chalk.red(`Error: ${loaded.message}`));
            process.exitCode = EXIT_CONFIG_ERROR;
            return EXIT_CONFIG_ERROR;
        }
        Logger.setLevel(options.verbose ? 'debug' : loaded.config.log_level);

        const collaborators = deps.collaborators ?? createCollaborators(loaded.config, cwd);
        const runner = new HookRunner({ ...collaborators, echo: deps.echo });
        const result = await runner.run();

        if (result.failure) {
            reportFailure(result.failure);
        } else {
            Logger.debug(`Processed ${result.processed.length} file(s) in ${result.duration_ms}ms`);
        }

        process.exitCode = result.exitCode;
        return result.exitCode;
    } catch (error: unknown) {
        const msg = error instanceof Error ? error.message : String(error);
        console.error(chalk.red(`\n❌ FATAL ERROR: ${msg}`));
        process.exitCode = EXIT_INTERNAL_ERROR;
        return EXIT_INTERNAL_ERROR;
    }
}
