/**
 * Configured parsing entry point.
 *
 * @packageDocumentation
 */

export { InterfaceParser } from './interface-parser.js';
export type { InterfaceParserOptions, TypeContext } from './interface-parser.js';
