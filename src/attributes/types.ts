/**
 * Types for the attribute parser
 */

import type { Diagnostic } from '../base/Diagnostics.js';
import type { AttributeMap } from '../model/types.js';

export interface AttributeParseResult {
  attributes: AttributeMap;
  diagnostics: Diagnostic[];
}
