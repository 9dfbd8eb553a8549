/**
 * Directive Scanner
 *
 * Splits SurfDoc text into prose spans and directive spans. Works line
 * by line: an opening line is a colon fence followed by a tag, a closing
 * line is a bare colon fence. A closer matches the innermost open
 * directive with the same fence length, so `::page` nests inside `::site`
 * and `:::column` inside `::columns`.
 *
 * Only directives at the current level are emitted. Anything nested stays
 * in the parent's body text; containers scan their body again with the
 * body's start position as the base.
 *
 * @since 2026-10-18
 */

import { ORIGIN, lineEnd, shift, splitLines } from '../base/SourceTypes.js';
import type { SourceLine, SourcePosition, SourceSpan } from '../base/SourceTypes.js';
import { createDiagnostic } from '../base/Diagnostics.js';
import type { Diagnostic } from '../base/Diagnostics.js';
import { AttributeParser } from '../attributes/AttributeParser.js';
import type { AttributeMap } from '../model/types.js';
import type { ScanResult, ScanSegment, ScannedDirective } from './types.js';

export const OPENING_LINE = /^(\s*)(:{2,})([A-Za-z][A-Za-z0-9_-]*)(.*)$/;
export const CLOSING_LINE = /^\s*(:{2,})\s*$/;

interface OpenDirective {
  line: number;
  fence: string;
  tag: string;
  /** Header text after the tag */
  rest: string;
  /** Column index of `rest` within the header line */
  restColumn: number;
}

/**
 * Normalise line endings to `\n`
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

export function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

export class DirectiveScanner {
  private readonly attributeParser = new AttributeParser();

  /**
   * Scan `text` into segments
   *
   * @param base - Position of the first character of `text` in the full document
   */
  scan(text: string, base: SourcePosition = ORIGIN): ScanResult {
    const lines = splitLines(normalizeLineEndings(text), base);
    const segments: ScanSegment[] = [];
    const diagnostics: Diagnostic[] = [];
    const stack: OpenDirective[] = [];
    let proseStart = 0;

    for (let i = 0; i < lines.length; i++) {
      const content = lines[i].text;

      const closing = CLOSING_LINE.exec(content);
      if (closing) {
        const fenceLength = closing[1].length;
        let match = -1;
        for (let j = stack.length - 1; j >= 0; j--) {
          if (stack[j].fence.length === fenceLength) {
            match = j;
            break;
          }
        }
        if (match === -1) continue;
        const opened = stack[match];
        stack.length = match;
        if (match === 0) {
          segments.push(this.emitDirective(lines, opened, i, diagnostics));
          proseStart = i + 1;
        }
        continue;
      }

      const opening = OPENING_LINE.exec(content);
      if (opening) {
        if (stack.length === 0) {
          this.emitProse(lines, proseStart, i, segments);
        }
        const [, indent, fence, tag, rest] = opening;
        stack.push({
          line: i,
          fence,
          tag,
          rest,
          restColumn: indent.length + fence.length + tag.length,
        });
      }
    }

    if (stack.length > 0) {
      const opened = stack[0];
      const directive = this.emitDirective(lines, opened, null, diagnostics);
      diagnostics.push(
        createDiagnostic(
          'unterminated-directive',
          `Directive '${opened.tag}' is not closed; expected a '${opened.fence}' line`,
          directive.headerSpan
        )
      );
      segments.push(directive);
    } else {
      this.emitProse(lines, proseStart, lines.length, segments);
    }

    return { segments, diagnostics };
  }

  private emitProse(lines: SourceLine[], from: number, to: number, segments: ScanSegment[]): void {
    let first = from;
    let last = to - 1;
    while (first <= last && isBlank(lines[first].text)) first++;
    while (last >= first && isBlank(lines[last].text)) last--;
    if (first > last) return;

    const text = lines.slice(first, last + 1).map(line => line.text).join('\n');
    segments.push({
      kind: 'prose',
      text,
      span: { start: lines[first].start, end: lineEnd(lines[last]) },
    });
  }

  /**
   * @param closer - Index of the closing line, or null when input ended first
   */
  private emitDirective(
    lines: SourceLine[],
    opened: OpenDirective,
    closer: number | null,
    diagnostics: Diagnostic[]
  ): ScannedDirective {
    const header = lines[opened.line];
    const headerSpan: SourceSpan = { start: header.start, end: lineEnd(header) };

    let bodyEnd = closer ?? lines.length;
    if (closer === null) {
      while (bodyEnd > opened.line + 1 && isBlank(lines[bodyEnd - 1].text)) bodyEnd--;
    }
    const bodyLines = lines.slice(opened.line + 1, bodyEnd);
    const body = bodyLines.map(line => line.text).join('\n');
    const bodyStart = bodyLines.length > 0 ? bodyLines[0].start : headerSpan.end;

    const last = closer ?? bodyEnd - 1;
    const end: SourcePosition = lineEnd(lines[last]);
    const rawText = lines.slice(opened.line, last + 1).map(line => line.text).join('\n');

    return {
      kind: 'directive',
      name: opened.tag.toLowerCase(),
      tag: opened.tag,
      fence: opened.fence,
      rawAttributes: opened.rest,
      rawText,
      attributes: this.parseHeader(opened, header, diagnostics),
      body,
      bodyStart,
      span: { start: header.start, end },
      headerSpan,
      closed: closer !== null,
    };
  }

  private parseHeader(opened: OpenDirective, header: SourceLine, diagnostics: Diagnostic[]): AttributeMap {
    const rest = opened.rest;
    const leading = rest.length - rest.trimStart().length;
    const trimmed = rest.trim();
    if (trimmed.length === 0) return new Map();

    const origin = shift(header.start, opened.restColumn + leading);
    const headerEnd = shift(header.start, opened.restColumn + rest.trimEnd().length);

    if (!trimmed.startsWith('[')) {
      diagnostics.push(
        createDiagnostic(
          'malformed-attributes',
          `Expected '[' after directive '${opened.tag}', found '${trimmed}'`,
          { start: origin, end: headerEnd }
        )
      );
      return new Map();
    }

    const close = findListEnd(trimmed);
    if (close === -1) {
      diagnostics.push(
        createDiagnostic(
          'malformed-attributes',
          `Attribute list of '${opened.tag}' is missing its closing ']'`,
          { start: origin, end: headerEnd }
        )
      );
    } else if (close < trimmed.length - 1) {
      diagnostics.push(
        createDiagnostic(
          'malformed-attributes',
          `Unexpected text after the attribute list of '${opened.tag}'`,
          { start: shift(origin, close + 1), end: headerEnd }
        )
      );
    }

    const list = close === -1 ? trimmed : trimmed.slice(0, close + 1);
    const result = this.attributeParser.parse(list, origin);
    diagnostics.push(...result.diagnostics);
    return result.attributes;
  }
}

/**
 * Index of the `]` that closes the list opened at index 0, skipping
 * quoted text and nested list values; -1 when it never closes
 */
function findListEnd(text: string): number {
  let depth = 0;
  let quoted = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '\\') i++;
      else if (ch === '"') quoted = false;
      continue;
    }
    if (ch === '"') quoted = true;
    else if (ch === '[') depth++;
    else if (ch === ']') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}
