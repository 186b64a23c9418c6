import fs from 'fs-extra';
import path from 'path';
import type { FormatterSettings, ToolOutcome } from '../types/index.js';
import type { Formatter } from './types.js';
import { formatCommand, type ToolExecutor } from './executor.js';
import { flattenFormatterConfig } from '../config/flatten.js';

/**
 * Formatter that shells out to a configured command, e.g. rustfmt or black.
 */
export class CommandFormatter implements Formatter {
    readonly check?: (file: string, options?: string) => Promise<ToolOutcome>;

    constructor(
        readonly name: string,
        private readonly settings: FormatterSettings,
        private readonly cwd: string,
        private readonly exec: ToolExecutor,
    ) {
        if (settings.check) {
            this.check = (file, options) => this.invoke([settings.check_flag], file, options);
        }
    }

    async resolveOptions(): Promise<string | undefined> {
        const { config_file } = this.settings;
        if (!config_file) {
            return undefined;
        }
        const configPath = path.resolve(this.cwd, config_file);
        if (!(await fs.pathExists(configPath))) {
            throw new Error(`Formatter config not found: ${config_file}`);
        }
        return flattenFormatterConfig(await fs.readFile(configPath, 'utf-8'));
    }

    write(file: string, options?: string): Promise<ToolOutcome> {
        return this.invoke([], file, options);
    }

    buildArgs(modeArgs: string[], file: string, options?: string): string[] {
        const optionArgs = options ? [this.settings.config_flag, options] : [];
        return [...this.settings.args, ...modeArgs, ...optionArgs, file];
    }

    private async invoke(modeArgs: string[], file: string, options?: string): Promise<ToolOutcome> {
        const args = this.buildArgs(modeArgs, file, options);
        const { exitCode } = await this.exec(this.settings.command, args, { cwd: this.cwd });
        return { command: formatCommand(this.settings.command, args), exitCode };
    }
}
