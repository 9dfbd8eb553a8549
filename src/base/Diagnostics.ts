/**
 * Diagnostic codes and helpers
 *
 * Codes are stable identifiers for tooling (lint filters, CI gates).
 * Severity is fixed per code and cannot be overridden by callers.
 */

import type { SourceSpan } from './SourceTypes.js';

export type Severity = 'error' | 'warning';

export type DiagnosticCode =
  | 'unterminated-directive'
  | 'malformed-attributes'
  | 'duplicate-attribute'
  | 'required-attribute-missing'
  | 'attribute-type-mismatch'
  | 'enum-value-invalid'
  | 'orphan-page'
  | 'site-without-pages'
  | 'empty-container'
  | 'faq-entry-incomplete'
  | 'pricing-tier-mismatch'
  | 'metric-unit-unknown'
  | 'decision-outcome-missing'
  | 'code-language-missing'
  | 'alt-text-missing'
  | 'testimonial-author-missing'
  | 'nesting-too-deep'
  | 'duplicate-id'
  | 'page-order-conflict'
  | 'page-route-conflict';

export interface DiagnosticDescriptor {
  severity: Severity;
  /** One-line summary for documentation and tooling */
  summary: string;
}

export const DIAGNOSTIC_CATALOG: Readonly<Record<DiagnosticCode, DiagnosticDescriptor>> = {
  'unterminated-directive': { severity: 'error', summary: 'Directive has no closing fence' },
  'malformed-attributes': { severity: 'error', summary: 'Attribute list cannot be parsed' },
  'duplicate-attribute': { severity: 'error', summary: 'Attribute key given more than once' },
  'required-attribute-missing': { severity: 'error', summary: 'Required attribute is absent' },
  'attribute-type-mismatch': { severity: 'error', summary: 'Attribute value has the wrong type' },
  'enum-value-invalid': { severity: 'error', summary: 'Attribute value is not an accepted choice' },
  'orphan-page': { severity: 'error', summary: 'Page is not a direct child of a site' },
  'site-without-pages': { severity: 'error', summary: 'Site contains no pages' },
  'empty-container': { severity: 'error', summary: 'Container has no panels or items' },
  'faq-entry-incomplete': { severity: 'error', summary: 'FAQ entry lacks a question or an answer' },
  'pricing-tier-mismatch': { severity: 'error', summary: 'Pricing tiers have different feature counts' },
  'metric-unit-unknown': { severity: 'warning', summary: 'Metric unit is not in the unit vocabulary' },
  'decision-outcome-missing': { severity: 'error', summary: 'Decision does not state an outcome among its options' },
  'code-language-missing': { severity: 'warning', summary: 'Code block does not declare a language' },
  'alt-text-missing': { severity: 'warning', summary: 'Image has no alternative text' },
  'testimonial-author-missing': { severity: 'error', summary: 'Testimonial has no author attribution' },
  'nesting-too-deep': { severity: 'error', summary: 'Containers are nested beyond the depth limit' },
  'duplicate-id': { severity: 'error', summary: 'Block id is already used in this document' },
  'page-order-conflict': { severity: 'warning', summary: 'Page order values tie, skip or are invalid' },
  'page-route-conflict': { severity: 'error', summary: 'Page declares a route another page already declares' },
};

export interface Diagnostic {
  code: DiagnosticCode;
  severity: Severity;
  message: string;
  span: SourceSpan;
  /** Second location for cross-reference problems (first use of an id, enclosing container) */
  relatedSpan?: SourceSpan;
}

export function createDiagnostic(
  code: DiagnosticCode,
  message: string,
  span: SourceSpan,
  relatedSpan?: SourceSpan
): Diagnostic {
  const diagnostic: Diagnostic = {
    code,
    severity: DIAGNOSTIC_CATALOG[code].severity,
    message,
    span,
  };
  if (relatedSpan) {
    diagnostic.relatedSpan = relatedSpan;
  }
  return diagnostic;
}

/**
 * Document order of the offending node, then code. Stable for equal keys.
 */
export function sortDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return diagnostics
    .map((diagnostic, index) => ({ diagnostic, index }))
    .sort((a, b) =>
      a.diagnostic.span.start.offset - b.diagnostic.span.start.offset ||
      compareCodes(a.diagnostic.code, b.diagnostic.code) ||
      a.index - b.index
    )
    .map(entry => entry.diagnostic);
}

function compareCodes(a: DiagnosticCode, b: DiagnosticCode): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some(d => d.severity === 'error');
}
