/**
 * APX format reader.
 *
 * @packageDocumentation
 */

export { ApxParseError, parseApx, readFramework } from './parser.js';
export type { ApxDocument } from './parser.js';
