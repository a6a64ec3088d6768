/**
 * CLI module: a thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { applyCliOverrides, registerRunCommand, scenarioUrl } from './run.js';
export { compiledToJSON, formatCompiled, registerCompileCommand } from './compile.js';
