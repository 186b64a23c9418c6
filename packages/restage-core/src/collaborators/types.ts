import type { StagedListing, ToolOutcome } from '../types/index.js';

/** Dependency vulnerability audit; passes or fails as a whole. */
export interface Auditor {
    run(): Promise<ToolOutcome>;
}

export interface VersionControl {
    /** Paths staged for commit, relative to the repository root, in the tool's order. */
    listStaged(): Promise<StagedListing>;
    add(file: string): Promise<ToolOutcome>;
}

export interface Formatter {
    readonly name: string;
    /**
     * Build the flattened option string for this formatter. Read fresh on
     * every call; undefined when the formatter takes no options.
     */
    resolveOptions(): Promise<string | undefined>;
    /** Report-only run. Formatters without a check mode leave this out. */
    check?(file: string, options?: string): Promise<ToolOutcome>;
    /** Rewrite the file in place. */
    write(file: string, options?: string): Promise<ToolOutcome>;
}

/** Formatters keyed by extension tag ("rs", "py"). */
export type FormatterRegistry = ReadonlyMap<string, Formatter>;

export interface HookCollaborators {
    auditor: Auditor;
    vcs: VersionControl;
    formatters: FormatterRegistry;
}
