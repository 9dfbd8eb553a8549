/**
 * Parser facade
 *
 * @since 2026-10-18
 */

export { SurfDocParser, parse, validate, revalidate, contentHash } from './SurfDocParser.js';
export type { ParseOptions, ParseResult, SurfDocParserOptions } from './types.js';
