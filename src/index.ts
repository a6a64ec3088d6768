/**
 * plainstep library entry point.
 * Everything the CLI uses is available for programmatic runs.
 */

export * from './schema/index.js';
export * from './core/index.js';
export * from './browser/index.js';
export * from './config/index.js';
export * from './report/index.js';
export { createLogger, silentLogger } from './utils/logger.js';
export type { Logger, LoggerOptions } from './utils/logger.js';
export { normalizeTarget, slugify, stripQuotes } from './utils/text.js';
