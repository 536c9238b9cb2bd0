/**
 * Type-and-value model for an interface definition language.
 *
 * Resolves type strings, parses literal values against them and assembles
 * validated message and service specifications.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './errors/index.js';
export * from './naming/index.js';
export * from './type-model/index.js';
export * from './values/index.js';
export * from './specification/index.js';
export * from './config/index.js';
export * from './parser/index.js';
export { Logger, logger } from './utils/logger.js';
export type { LogEntry, LoggerOptions, LogLevel } from './utils/logger.js';
