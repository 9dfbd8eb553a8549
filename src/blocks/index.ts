/**
 * Typed block construction
 */

export { BlockBuilder } from './BlockBuilder.js';
export type { BuildResult } from './BlockBuilder.js';
export {
  BLOCK_SCHEMAS,
  UNIVERSAL_ATTRIBUTES,
  CALLOUT_TYPES,
  DATA_FORMATS,
  DECISION_STATUSES,
  TRENDS,
  isTypedKind,
  keysFor,
} from './schemas.js';
export type { AttributeSpec, AttributeType, BlockSchema, ContentPolicy } from './schemas.js';
export { parsePipeTable, parseCsv, parseJsonTable, parseTaskItems, parseProperties, unparsedBody } from './content.js';
export type { TableContent } from './content.js';
