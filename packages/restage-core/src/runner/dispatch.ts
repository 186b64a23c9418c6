import path from 'path';
import type { Formatter, FormatterRegistry } from '../collaborators/types.js';

/**
 * Everything after the final "." of the base name. Names without a dot have
 * the empty tag. Case-sensitive, so `MAIN.RS` is not an `rs` file.
 */
export function extensionTag(file: string): string {
    const base = path.posix.basename(file);
    const dot = base.lastIndexOf('.');
    return dot === -1 ? '' : base.slice(dot + 1);
}

export function resolveFormatter(formatters: FormatterRegistry, file: string): Formatter | undefined {
    const tag = extensionTag(file);
    return tag ? formatters.get(tag) : undefined;
}
