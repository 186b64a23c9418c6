import type { Config } from '../types/index.js';
import type { Formatter, HookCollaborators } from './types.js';
import { execaExecutor, type ToolExecutor } from './executor.js';
import { CommandAuditor } from './auditor.js';
import { GitVersionControl } from './git.js';
import { CommandFormatter } from './formatter.js';

export * from './types.js';
export * from './executor.js';
export { CommandAuditor } from './auditor.js';
export { GitVersionControl, parseNulSeparated } from './git.js';
export { CommandFormatter } from './formatter.js';

export interface ProcessCollaborators extends HookCollaborators {
    vcs: GitVersionControl;
}

/**
 * Wire the process-backed collaborators for a repository root.
 */
export function createCollaborators(config: Config, cwd: string, exec: ToolExecutor = execaExecutor): ProcessCollaborators {
    const formatters = new Map<string, Formatter>();
    for (const [tag, settings] of Object.entries(config.formatters)) {
        formatters.set(tag, new CommandFormatter(tag, settings, cwd, exec));
    }
    return {
        auditor: new CommandAuditor(config.audit, cwd, exec),
        vcs: new GitVersionControl(cwd, exec, config.git.command),
        formatters,
    };
}
