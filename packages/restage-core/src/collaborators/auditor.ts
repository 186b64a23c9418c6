import type { Config, ToolOutcome } from '../types/index.js';
import type { Auditor } from './types.js';
import { formatCommand, type ToolExecutor } from './executor.js';
import { Logger } from '../utils/logger.js';

export class CommandAuditor implements Auditor {
    constructor(
        private readonly settings: Config['audit'],
        private readonly cwd: string,
        private readonly exec: ToolExecutor,
    ) { }

    async run(): Promise<ToolOutcome> {
        const { command, args } = this.settings;
        if (!this.settings.enabled) {
            Logger.warn('Dependency audit is disabled in restage.yml');
            return { command: '(audit disabled)', exitCode: 0 };
        }
        const { exitCode } = await this.exec(command, args, { cwd: this.cwd });
        return { command: formatCommand(command, args), exitCode };
    }
}
