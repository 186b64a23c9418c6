import fs from 'fs-extra';
import path from 'path';
import yaml from 'yaml';
import type { ZodError } from 'zod';
import { ConfigSchema, type Config } from '../types/index.js';
import { Logger } from '../utils/logger.js';

export const CONFIG_FILE_NAME = 'restage.yml';

export type ConfigLoadResult =
    | { ok: true; config: Config; source: string | null }
    | { ok: false; message: string };

function describeIssues(error: ZodError): string {
    return error.issues
        .map(issue => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('\n');
}

/**
 * Load restage.yml from the repository root, falling back to the defaults
 * when the file does not exist.
 */
export async function loadConfig(cwd: string, configPath?: string): Promise<ConfigLoadResult> {
    const resolved = configPath ? path.resolve(cwd, configPath) : path.join(cwd, CONFIG_FILE_NAME);

    if (!(await fs.pathExists(resolved))) {
        if (configPath) {
            return { ok: false, message: `Config file not found: ${resolved}` };
        }
        Logger.debug(`No ${CONFIG_FILE_NAME} in ${cwd}, using defaults`);
        return { ok: true, config: ConfigSchema.parse({}), source: null };
    }

    let raw: unknown;
    try {
        raw = yaml.parse(await fs.readFile(resolved, 'utf-8'));
    } catch (error: unknown) {
        const msg = error instanceof Error ? error.message : String(error);
        return { ok: false, message: `Malformed YAML in ${resolved}: ${msg}` };
    }

    // An empty file parses to null
    const parsed = ConfigSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        return { ok: false, message: `Invalid config in ${resolved}:\n${describeIssues(parsed.error)}` };
    }

    Logger.debug(`Config loaded from ${resolved}`);
    return { ok: true, config: parsed.data, source: resolved };
}
