/**
 * Tests for the line-based directive scanner
 */
import { describe, it, expect } from 'vitest';
import { DirectiveScanner, normalizeLineEndings } from '../src/scanner/index.js';
import type { ScanSegment, ScannedDirective } from '../src/scanner/index.js';

const scanner = new DirectiveScanner();

function directiveAt(segments: ScanSegment[], index: number): ScannedDirective {
  const segment = segments[index];
  if (segment.kind !== 'directive') {
    throw new Error(`segment ${index} is prose`);
  }
  return segment;
}

describe('DirectiveScanner', () => {
  it('should split prose and directives with positions', () => {
    const text = 'Intro paragraph.\n\n::callout[type=tip]\nBody line\n::\n\nOutro.';
    const { segments, diagnostics } = scanner.scan(text);

    expect(diagnostics).toEqual([]);
    expect(segments.map(s => s.kind)).toEqual(['prose', 'directive', 'prose']);

    expect(segments[0]).toEqual({
      kind: 'prose',
      text: 'Intro paragraph.',
      span: { start: { line: 1, column: 1, offset: 0 }, end: { line: 1, column: 17, offset: 16 } },
    });

    const directive = directiveAt(segments, 1);
    expect(directive.name).toBe('callout');
    expect(directive.body).toBe('Body line');
    expect(directive.closed).toBe(true);
    expect(directive.bodyStart).toEqual({ line: 4, column: 1, offset: 38 });
    expect(directive.span).toEqual({
      start: { line: 3, column: 1, offset: 18 },
      end: { line: 5, column: 3, offset: 50 },
    });
    expect(directive.headerSpan.end).toEqual({ line: 3, column: 20, offset: 37 });
    expect(directive.attributes.get('type')).toEqual({ kind: 'symbol', value: 'tip' });

    expect(segments[2].span.start).toEqual({ line: 7, column: 1, offset: 52 });
  });

  it('should keep nested directives in the body of the outer one', () => {
    const text = '::columns\n:::column\nA\n:::\n:::column\nB\n:::\n::';
    const { segments } = scanner.scan(text);

    expect(segments).toHaveLength(1);
    const directive = directiveAt(segments, 0);
    expect(directive.name).toBe('columns');
    expect(directive.body).toBe(':::column\nA\n:::\n:::column\nB\n:::');
  });

  it('should match a closer to the innermost directive with the same fence', () => {
    const text = '::site\n::page[route="/"]\nHi\n::\n::';
    const { segments, diagnostics } = scanner.scan(text);

    expect(diagnostics).toEqual([]);
    expect(segments).toHaveLength(1);
    expect(directiveAt(segments, 0).body).toBe('::page[route="/"]\nHi\n::');
  });

  it('should report an unterminated directive and keep its body', () => {
    const { segments, diagnostics } = scanner.scan('::callout\nNo end\n\n');

    const directive = directiveAt(segments, 0);
    expect(directive.closed).toBe(false);
    expect(directive.body).toBe('No end');
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].code).toBe('unterminated-directive');
    expect(diagnostics[0].message).toBe("Directive 'callout' is not closed; expected a '::' line");
    expect(diagnostics[0].span).toEqual({
      start: { line: 1, column: 1, offset: 0 },
      end: { line: 1, column: 10, offset: 9 },
    });
  });

  it('should leave a stray closer in the prose', () => {
    const { segments, diagnostics } = scanner.scan('Text\n::\nMore');
    expect(diagnostics).toEqual([]);
    expect(segments).toEqual([
      {
        kind: 'prose',
        text: 'Text\n::\nMore',
        span: { start: { line: 1, column: 1, offset: 0 }, end: { line: 3, column: 5, offset: 12 } },
      },
    ]);
  });

  it('should treat CRLF input like LF input', () => {
    const crlf = scanner.scan('a\r\n::note\r\nx\r\n::');
    const lf = scanner.scan('a\n::note\nx\n::');
    expect(crlf).toEqual(lf);
    expect(normalizeLineEndings('a\r\nb\rc')).toBe('a\nb\nc');
  });

  it('should lowercase the name but keep the tag as written', () => {
    const directive = directiveAt(scanner.scan('::Callout[type=tip]\nx\n::').segments, 0);
    expect(directive.name).toBe('callout');
    expect(directive.tag).toBe('Callout');
    expect(directive.fence).toBe('::');
    expect(directive.rawAttributes).toBe('[type=tip]');
  });

  it('should report a header without brackets', () => {
    const { segments, diagnostics } = scanner.scan('::callout type=warning\nx\n::');

    expect(directiveAt(segments, 0).attributes.size).toBe(0);
    expect(diagnostics.map(d => d.message)).toEqual([
      "Expected '[' after directive 'callout', found 'type=warning'",
    ]);
  });

  it('should report text after the attribute list', () => {
    const { segments, diagnostics } = scanner.scan('::callout[type=tip] extra\nx\n::');

    expect(directiveAt(segments, 0).attributes.get('type')).toEqual({ kind: 'symbol', value: 'tip' });
    expect(diagnostics.map(d => d.message)).toEqual([
      "Unexpected text after the attribute list of 'callout'",
    ]);
    expect(diagnostics[0].span.start.column).toBe(20);
  });

  it('should parse what it can from an unclosed attribute list', () => {
    const { segments, diagnostics } = scanner.scan('::callout[type=tip\nx\n::');

    expect(directiveAt(segments, 0).attributes.get('type')).toEqual({ kind: 'symbol', value: 'tip' });
    expect(diagnostics.map(d => d.message)).toEqual([
      "Attribute list of 'callout' is missing its closing ']'",
    ]);
  });

  it('should offset positions by the base position', () => {
    const { segments } = scanner.scan('::note\nx\n::', { line: 10, column: 1, offset: 100 });
    const directive = directiveAt(segments, 0);
    expect(directive.span.start).toEqual({ line: 10, column: 1, offset: 100 });
    expect(directive.bodyStart).toEqual({ line: 11, column: 1, offset: 107 });
  });
});
