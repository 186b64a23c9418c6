import { z } from 'zod';

export const FormatterSchema = z.object({
    command: z.string().min(1),
    args: z.array(z.string()).optional().default([]),
    check: z.boolean().optional().default(false), // run check mode before writing
    check_flag: z.string().optional().default('--check'),
    config_file: z.string().optional(), // relative to the repository root
    config_flag: z.string().optional().default('--config'),
});

export const DEFAULT_FORMATTERS = {
    rs: {
        command: 'rustfmt',
        check: true,
        config_file: 'tests/fmt.toml',
    },
    py: {
        command: 'black',
    },
};

export const ConfigSchema = z.object({
    version: z.number().default(1),
    log_level: z.enum(['debug', 'info', 'warn', 'error']).optional().default('info'),
    audit: z.object({
        enabled: z.boolean().optional().default(true),
        command: z.string().min(1).optional().default('cargo'),
        args: z.array(z.string()).optional().default(['audit']),
    }).optional().default({}),
    git: z.object({
        command: z.string().min(1).optional().default('git'),
    }).optional().default({}),
    // Keyed by extension tag, without the leading dot
    formatters: z.record(FormatterSchema).optional().default(DEFAULT_FORMATTERS),
});

export type FormatterSettings = z.infer<typeof FormatterSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type LogLevelName = Config['log_level'];

export interface ToolOutcome {
    command: string;
    exitCode: number;
}

export interface StagedListing extends ToolOutcome {
    files: string[];
}

export const FailureKindSchema = z.enum(['audit', 'enumeration', 'config', 'check', 'write', 'stage']);
export type FailureKind = z.infer<typeof FailureKindSchema>;

export interface HookFailure {
    kind: FailureKind;
    exitCode: number;
    message: string;
    file?: string;
}

export type HookState = 'idle' | 'auditing' | 'enumerating' | 'processing' | 'done' | 'failed';

export interface HookRunResult {
    status: 'pass' | 'fail';
    exitCode: number;
    /** Files that were formatted (where applicable) and re-staged, in order */
    processed: string[];
    failure?: HookFailure;
    duration_ms: number;
}

// Exit codes the runner itself produces; tool failures keep the tool's code
export const EXIT_PASS = 0;
export const EXIT_FAIL = 1;
export const EXIT_CONFIG_ERROR = 2;
export const EXIT_INTERNAL_ERROR = 3;
export const EXIT_COMMAND_NOT_FOUND = 127;
