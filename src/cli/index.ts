/**
 * CLI module: thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { registerRunCommand, resolveRunOptions } from './run.js';
export type { ResolvedRunOptions, RunFlags } from './run.js';
