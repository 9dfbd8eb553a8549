/**
 * Split a container body into sections at marker lines (headings for tabs
 * and FAQ, `---` for columns). Marker lines inside nested directives or
 * code fences do not count.
 */

import { lineEnd } from '../base/SourceTypes.js';
import type { SourceLine, SourcePosition, SourceSpan } from '../base/SourceTypes.js';
import { CLOSING_LINE, OPENING_LINE, isBlank } from '../scanner/DirectiveScanner.js';

export interface Section {
  /** Marker text (heading title), or null for content before the first marker */
  marker: string | null;
  /** Marker line, absent for the leading section */
  markerLine?: SourceLine;
  lines: SourceLine[];
}

export type MarkerMatcher = (trimmedLine: string) => string | null;

export const headingMarker: MarkerMatcher = line => {
  const match = /^#{2,3}\s+(.*)$/.exec(line);
  return match ? match[1].trim() : null;
};

export const ruleMarker: MarkerMatcher = line => (line === '---' ? '' : null);

export function splitSections(lines: readonly SourceLine[], matcher: MarkerMatcher): Section[] {
  const sections: Section[] = [{ marker: null, lines: [] }];
  const fences: number[] = [];
  let codeFence: string | null = null;

  for (const line of lines) {
    const trimmed = line.text.trim();
    const current = sections[sections.length - 1];

    if (codeFence !== null) {
      if (trimmed.startsWith(codeFence)) codeFence = null;
      current.lines.push(line);
      continue;
    }
    const backticks = /^(`{3,}|~{3,})/.exec(trimmed);
    if (backticks) {
      codeFence = backticks[1];
      current.lines.push(line);
      continue;
    }

    const closing = CLOSING_LINE.exec(line.text);
    if (closing) {
      const index = fences.lastIndexOf(closing[1].length);
      if (index !== -1) fences.length = index;
      current.lines.push(line);
      continue;
    }
    const opening = OPENING_LINE.exec(line.text);
    if (opening) {
      fences.push(opening[2].length);
      current.lines.push(line);
      continue;
    }

    const marker = fences.length === 0 ? matcher(trimmed) : null;
    if (marker !== null) {
      sections.push({ marker, markerLine: line, lines: [] });
    } else {
      current.lines.push(line);
    }
  }
  return sections;
}

export interface SectionText {
  text: string;
  start: SourcePosition;
  span: SourceSpan;
}

/**
 * Section lines without leading and trailing blank lines, or null when
 * nothing but whitespace remains
 */
export function sectionText(lines: readonly SourceLine[]): SectionText | null {
  let first = 0;
  let last = lines.length - 1;
  while (first <= last && isBlank(lines[first].text)) first++;
  while (last >= first && isBlank(lines[last].text)) last--;
  if (first > last) return null;
  const kept = lines.slice(first, last + 1);
  return {
    text: kept.map(line => line.text).join('\n'),
    start: kept[0].start,
    span: { start: kept[0].start, end: lineEnd(kept[kept.length - 1]) },
  };
}

/**
 * Span of a whole section, marker line included
 */
export function sectionSpan(section: Section, fallback: SourcePosition): SourceSpan {
  const all = section.markerLine ? [section.markerLine, ...section.lines] : section.lines;
  const content = sectionText(all);
  return content ? content.span : { start: fallback, end: fallback };
}
