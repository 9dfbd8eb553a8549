/**
 * Directive scanning
 */

export { DirectiveScanner, normalizeLineEndings, isBlank, OPENING_LINE, CLOSING_LINE } from './DirectiveScanner.js';
export type { ScanResult, ScanSegment, ScannedDirective, ScannedProse } from './types.js';
