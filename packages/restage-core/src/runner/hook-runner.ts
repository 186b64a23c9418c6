/**
 * Hook runner: audit, enumerate staged files, format each one by extension,
 * re-stage it, and stop at the first failing step.
 *
 * The runner never talks to processes itself. Every external step goes
 * through an injected collaborator, so the whole protocol can be driven by
 * in-memory stubs.
 */

import type { HookCollaborators, Formatter } from '../collaborators/types.js';
import type { HookFailure, HookRunResult, HookState, ToolOutcome } from '../types/index.js';
import { EXIT_CONFIG_ERROR, EXIT_PASS } from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { extensionTag, resolveFormatter } from './dispatch.js';

export interface HookRunnerOptions extends HookCollaborators {
    /** Operator-visible output for each staged path. Defaults to stdout. */
    echo?: (line: string) => void;
}

export class HookRunner {
    private readonly collaborators: HookCollaborators;
    private readonly echo: (line: string) => void;
    private currentState: HookState = 'idle';

    constructor(options: HookRunnerOptions) {
        const { echo, ...collaborators } = options;
        this.collaborators = collaborators;
        this.echo = echo ?? (line => console.log(line));
    }

    get state(): HookState {
        return this.currentState;
    }

    async run(): Promise<HookRunResult> {
        if (this.currentState !== 'idle') {
            throw new Error(`HookRunner already used (state: ${this.currentState})`);
        }
        const start = Date.now();
        const processed: string[] = [];
        const { auditor, vcs } = this.collaborators;

        this.transition('auditing');
        const audit = await auditor.run();
        if (audit.exitCode !== 0) {
            return this.fail(start, processed, {
                kind: 'audit',
                exitCode: audit.exitCode,
                message: `Dependency audit failed: ${audit.command}`,
            });
        }

        this.transition('enumerating');
        const listing = await vcs.listStaged();
        if (listing.exitCode !== 0) {
            return this.fail(start, processed, {
                kind: 'enumeration',
                exitCode: listing.exitCode,
                message: `Could not list staged files: ${listing.command}`,
            });
        }
        Logger.debug(`${listing.files.length} staged file(s)`);

        this.transition('processing');
        for (const file of listing.files) {
            this.echo(file);
            const failure = await this.processFile(file);
            if (failure) {
                return this.fail(start, processed, failure);
            }
            processed.push(file);
        }

        this.transition('done');
        return {
            status: 'pass',
            exitCode: EXIT_PASS,
            processed,
            duration_ms: Date.now() - start,
        };
    }

    private async processFile(file: string): Promise<HookFailure | null> {
        const formatter = resolveFormatter(this.collaborators.formatters, file);
        if (formatter) {
            const failure = await this.format(formatter, file);
            if (failure) {
                return failure;
            }
        } else {
            Logger.debug(`${file}: no formatter for '${extensionTag(file)}'`);
        }

        const staged = await this.collaborators.vcs.add(file);
        return toolFailure('stage', staged, file, `Could not re-stage ${file}`);
    }

    private async format(formatter: Formatter, file: string): Promise<HookFailure | null> {
        let options: string | undefined;
        try {
            options = await formatter.resolveOptions();
        } catch (error: unknown) {
            const msg = error instanceof Error ? error.message : String(error);
            return { kind: 'config', exitCode: EXIT_CONFIG_ERROR, message: msg, file };
        }

        if (formatter.check) {
            const checked = await formatter.check(file, options);
            const failure = toolFailure('check', checked, file, `${formatter.name} check failed for ${file}`);
            if (failure) {
                return failure;
            }
        }

        const written = await formatter.write(file, options);
        return toolFailure('write', written, file, `${formatter.name} could not format ${file}`);
    }

    private fail(start: number, processed: string[], failure: HookFailure): HookRunResult {
        this.transition('failed');
        return {
            status: 'fail',
            exitCode: failure.exitCode,
            processed,
            failure,
            duration_ms: Date.now() - start,
        };
    }

    private transition(next: HookState) {
        Logger.debug(`hook: ${this.currentState} -> ${next}`);
        this.currentState = next;
    }
}

function toolFailure(
    kind: HookFailure['kind'], outcome: ToolOutcome, file: string, message: string
): HookFailure | null {
    if (outcome.exitCode === 0) {
        return null;
    }
    return { kind, exitCode: outcome.exitCode, message: `${message} (${outcome.command})`, file };
}
