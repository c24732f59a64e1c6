/**
 * CLI module — thin wrapper over core.
 * Parses arguments, delegates to the dispatcher, handles exit codes.
 * No business logic lives here.
 */

export { runCli, createProgram } from './program.js';
export type { CliIO } from './program.js';
export { createTargetRegistry, CHECK_COMMAND, TARGET_DESCRIPTIONS } from './targets.js';
export type { TargetDeps } from './targets.js';
