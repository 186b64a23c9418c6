import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { runCommand } from './run.js';
import type { Formatter, HookCollaborators, ToolOutcome } from '@restage/core';

function outcome(command: string, exitCode = 0): ToolOutcome {
    return { command, exitCode };
}

function stubCollaborators(files: string[], checkExit = 0, calls: string[] = []): HookCollaborators {
    const rustfmt: Formatter = {
        name: 'rustfmt',
        resolveOptions: async () => 'edition=2021',
        check: async file => {
            calls.push(`check ${file}`);
            return outcome(`rustfmt --check ${file}`, checkExit);
        },
        write: async file => {
            calls.push(`write ${file}`);
            return outcome(`rustfmt ${file}`);
        },
    };
    return {
        auditor: { run: async () => outcome('cargo audit') },
        vcs: {
            listStaged: async () => ({ ...outcome('git diff --cached --name-only -z'), files }),
            add: async file => {
                calls.push(`add ${file}`);
                return outcome(`git add -- ${file}`);
            },
        },
        formatters: new Map([['rs', rustfmt]]),
    };
}

describe('runCommand', () => {
    let testDir: string;
    let originalExitCode: typeof process.exitCode;

    beforeEach(() => {
        testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'restage-run-test-'));
        originalExitCode = process.exitCode;
        vi.spyOn(console, 'log').mockImplementation(() => { });
        vi.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(() => {
        fs.rmSync(testDir, { recursive: true, force: true });
        process.exitCode = originalExitCode;
        vi.restoreAllMocks();
    });

    it('exits 0 after formatting and re-staging lib.rs', async () => {
        const echoed: string[] = [];
        const calls: string[] = [];

        const code = await runCommand(testDir, {}, {
            collaborators: stubCollaborators(['lib.rs'], 0, calls),
            echo: line => echoed.push(line),
        });

        expect(code).toBe(0);
        expect(process.exitCode).toBe(0);
        expect(echoed).toEqual(['lib.rs']);
        expect(calls).toEqual(['check lib.rs', 'write lib.rs', 'add lib.rs']);
    });

    it('exits with the check-mode code and never writes or re-stages', async () => {
        const echoed: string[] = [];
        const calls: string[] = [];

        const code = await runCommand(testDir, {}, {
            collaborators: stubCollaborators(['lib.rs'], 1, calls),
            echo: line => echoed.push(line),
        });

        expect(code).toBe(1);
        expect(process.exitCode).toBe(1);
        expect(echoed).toEqual(['lib.rs']);
        expect(calls).toEqual(['check lib.rs']);
        expect(console.error).toHaveBeenCalledWith(expect.stringContaining('check failed for lib.rs (exit 1)'));
    });

    it('echoes paths on stdout by default', async () => {
        await runCommand(testDir, {}, { collaborators: stubCollaborators(['notes.md']) });

        expect(console.log).toHaveBeenCalledWith('notes.md');
    });

    it('exits 2 on an invalid restage.yml without running anything', async () => {
        fs.writeFileSync(path.join(testDir, 'restage.yml'), 'log_level: loud\n');
        const calls: string[] = [];

        const code = await runCommand(testDir, {}, { collaborators: stubCollaborators(['lib.rs'], 0, calls) });

        expect(code).toBe(2);
        expect(process.exitCode).toBe(2);
        expect(calls).toEqual([]);
    });

    it('exits 3 when a collaborator throws', async () => {
        const collaborators = stubCollaborators(['lib.rs']);
        collaborators.auditor = { run: async () => { throw new Error('spawn exploded'); } };

        const code = await runCommand(testDir, {}, { collaborators });

        expect(code).toBe(3);
        expect(console.error).toHaveBeenCalledWith(expect.stringContaining('spawn exploded'));
    });
});
