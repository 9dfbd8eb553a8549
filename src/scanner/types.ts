/**
 * Types for the directive scanner
 */

import type { SourcePosition, SourceSpan } from '../base/SourceTypes.js';
import type { Diagnostic } from '../base/Diagnostics.js';
import type { AttributeMap } from '../model/types.js';

export interface ScannedProse {
  kind: 'prose';
  text: string;
  span: SourceSpan;
}

export interface ScannedDirective {
  kind: 'directive';
  /** Lower-cased tag, used for routing */
  name: string;
  /** Tag as written */
  tag: string;
  /** Colon run of the header line */
  fence: string;
  /** Header text after the tag, as written */
  rawAttributes: string;
  /** Header line through closing line (or last body line), as written */
  rawText: string;
  attributes: AttributeMap;
  /** Text between the header line and the closing fence */
  body: string;
  /** Position of the first body character */
  bodyStart: SourcePosition;
  /** Header line through closing fence (or end of input) */
  span: SourceSpan;
  /** Span of the header line alone */
  headerSpan: SourceSpan;
  closed: boolean;
}

export type ScanSegment = ScannedProse | ScannedDirective;

export interface ScanResult {
  segments: ScanSegment[];
  diagnostics: Diagnostic[];
}
