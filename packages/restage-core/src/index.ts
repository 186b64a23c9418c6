export * from './types/index.js';
export * from './utils/logger.js';
export { flattenFormatterConfig } from './config/flatten.js';
export { loadConfig, CONFIG_FILE_NAME } from './config/loader.js';
export type { ConfigLoadResult } from './config/loader.js';
export * from './collaborators/index.js';
export { HookRunner } from './runner/hook-runner.js';
export type { HookRunnerOptions } from './runner/hook-runner.js';
export { extensionTag, resolveFormatter } from './runner/dispatch.js';
export * from './hooks/index.js';
