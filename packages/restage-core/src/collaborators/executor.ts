import os from 'os';
import { execa } from 'execa';
import { Logger } from '../utils/logger.js';
import { EXIT_COMMAND_NOT_FOUND, EXIT_FAIL } from '../types/index.js';

export interface ExecOptions {
    cwd: string;
    /** Pipe stdout back to the caller instead of passing it through to the operator */
    capture?: boolean;
}

export interface ExecResult {
    exitCode: number;
    stdout: string;
}

/**
 * Runs one external tool to completion. Never rejects on a non-zero exit;
 * the caller decides what the code means.
 */
export type ToolExecutor = (command: string, args: string[], options: ExecOptions) => Promise<ExecResult>;

export interface ProcessExit {
    exitCode?: number;
    signal?: string;
    failed: boolean;
    code?: string;
}

/**
 * Map a finished process onto a single shell-style exit code: the tool's
 * own code when it has one, 127 when it could not be started, 128 + n when
 * it was killed by signal n.
 */
export function normalizeExitCode(exit: ProcessExit): number {
    if (typeof exit.exitCode === 'number' && (exit.exitCode !== 0 || !exit.failed)) {
        return exit.exitCode;
    }
    if (exit.code === 'ENOENT') {
        return EXIT_COMMAND_NOT_FOUND;
    }
    if (exit.signal) {
        const signalNumber = Object.entries(os.constants.signals).find(([name]) => name === exit.signal)?.[1];
        if (typeof signalNumber === 'number') {
            return 128 + signalNumber;
        }
    }
    return EXIT_FAIL;
}

export function formatCommand(command: string, args: string[]): string {
    return [command, ...args].join(' ');
}

export const execaExecutor: ToolExecutor = async (command, args, options) => {
    Logger.debug(`$ ${formatCommand(command, args)}`);
    const result = await execa(command, args, {
        cwd: options.cwd,
        reject: false,
        stdin: 'ignore',
        stdout: options.capture ? 'pipe' : 'inherit',
        stderr: 'inherit',
    });
    const exitCode = normalizeExitCode({
        exitCode: result.exitCode,
        signal: result.signal,
        failed: result.failed,
        code: 'code' in result && typeof result.code === 'string' ? result.code : undefined,
    });
    Logger.debug(`  exited with ${exitCode}`);
    return {
        exitCode,
        stdout: options.capture ? result.stdout : '',
    };
};
