/**
 * Git hook script templates.
 */

export interface GeneratedHookFile {
    /** File name inside the git hooks directory */
    name: string;
    content: string;
    executable: boolean;
    description: string;
}

export const HOOK_MARKER = '# installed by restage';

function shellEscape(arg: string): string {
    if (/^[A-Za-z0-9_/@%+=:,.-]+$/.test(arg)) {
        return arg;
    }
    return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * POSIX sh pre-commit hook that hands over to the runner. `exec` keeps the
 * runner's exit code as the hook's exit code.
 */
export function generatePreCommitHook(runnerCommand: string[]): GeneratedHookFile {
    const command = runnerCommand.map(shellEscape).join(' ');
    return {
        name: 'pre-commit',
        content: `#!/bin/sh\n${HOOK_MARKER}\nexec ${command}\n`,
        executable: true,
        description: 'pre-commit hook: audit, format and re-stage staged files',
    };
}

export function isGeneratedHook(content: string): boolean {
    return content.includes(HOOK_MARKER);
}
