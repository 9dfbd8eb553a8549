/**
 * SurfDoc document model
 *
 * Typed block union, document root, traversal and attribute helpers.
 *
 * @since 2026-10-18
 */

export type * from './types.js';
export { childLists, childBlocks, isContainer, walkBlocks, findBlocks, isKind } from './traverse.js';
export type { WalkContext } from './traverse.js';
export { deepFreeze } from './freeze.js';
export { attrText, attrNumber, attrFlag, attrList, attrChoice, lookup, formatAttributeValue } from './attributes.js';
