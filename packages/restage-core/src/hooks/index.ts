export { generatePreCommitHook, isGeneratedHook, HOOK_MARKER } from './templates.js';
export type { GeneratedHookFile } from './templates.js';
