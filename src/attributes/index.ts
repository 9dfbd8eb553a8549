/**
 * Directive attribute lists
 */

export { AttributeParser, parseAttributes, coerceBareValue } from './AttributeParser.js';
export type { AttributeParseResult } from './types.js';
