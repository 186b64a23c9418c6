import path from 'path';
import type { StagedListing, ToolOutcome } from '../types/index.js';
import type { VersionControl } from './types.js';
import { formatCommand, type ToolExecutor } from './executor.js';

const LIST_STAGED_ARGS = ['diff', '--cached', '--name-only', '-z'];

/**
 * Split NUL-separated `git ... -z` output. Paths come back verbatim, with
 * no C-style quoting of unusual characters.
 */
export function parseNulSeparated(stdout: string): string[] {
    return stdout.split('\0').filter(entry => entry.length > 0);
}

export class GitVersionControl implements VersionControl {
    constructor(
        private readonly cwd: string,
        private readonly exec: ToolExecutor,
        private readonly gitCommand = 'git',
    ) { }

    async listStaged(): Promise<StagedListing> {
        const { exitCode, stdout } = await this.exec(this.gitCommand, LIST_STAGED_ARGS, { cwd: this.cwd, capture: true });
        return {
            command: formatCommand(this.gitCommand, LIST_STAGED_ARGS),
            exitCode,
            files: exitCode === 0 ? parseNulSeparated(stdout) : [],
        };
    }

    async add(file: string): Promise<ToolOutcome> {
        const args = ['add', '--', file];
        const { exitCode } = await this.exec(this.gitCommand, args, { cwd: this.cwd });
        return { command: formatCommand(this.gitCommand, args), exitCode };
    }

    /**
     * Absolute path of the directory git reads hooks from. Honors
     * core.hooksPath and linked worktrees.
     */
    async hooksDir(): Promise<string | null> {
        const { exitCode, stdout } = await this.exec(
            this.gitCommand, ['rev-parse', '--git-path', 'hooks'], { cwd: this.cwd, capture: true }
        );
        const dir = stdout.trim();
        if (exitCode !== 0 || !dir) {
            return null;
        }
        return path.resolve(this.cwd, dir);
    }
}
