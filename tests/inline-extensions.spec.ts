/**
 * Tests for inline status and evidence markers
 */
import { describe, it, expect } from 'vitest';
import { ProseEngine } from '../src/markdown/ProseEngine.js';
import { matchInlineExtension, scanInlineExtensions } from '../src/markdown/InlineExtensions.js';
import { parse } from '../src/parser/index.js';
import { AnsiRenderer } from '../src/renderers/index.js';

describe('scanInlineExtensions', () => {
  it('should find an evidence marker with its tier and source', () => {
    expect(scanInlineExtensions('Some text :evidence[tier=1 source="Gartner"] more text')).toEqual([
      {
        start: 10,
        end: 44,
        extension: { kind: 'evidence', tier: 1, source: 'Gartner', text: 'tier=1 source="Gartner"' },
      },
    ]);
  });

  it('should find several markers in order', () => {
    const found = scanInlineExtensions(':status[value=done] and :evidence[tier=2 source="IEEE"] end');
    expect(found.map(item => item.extension.kind)).toEqual(['status', 'evidence']);
    expect(found[0]).toEqual({ start: 0, end: 19, extension: { kind: 'status', value: 'done' } });
  });

  it('should skip double colons, open brackets and malformed attributes', () => {
    expect(scanInlineExtensions('::evidence[tier=1] is a block directive')).toEqual([]);
    expect(scanInlineExtensions('a :status[value=shipped')).toEqual([]);
    expect(scanInlineExtensions('a :evidence[tier=, x] b')).toEqual([]);
  });

  it('should read non-string status values as text', () => {
    expect(matchInlineExtension(':status[value=true]')?.extension).toEqual({ kind: 'status', value: 'true' });
    expect(matchInlineExtension(':status[]')?.extension).toEqual({ kind: 'status', value: '' });
  });
});

describe('inline markers in rendered prose', () => {
  const engine = new ProseEngine();

  it('should render markers as spans in HTML', () => {
    expect(engine.toHtml('Migration is :status[value=shipped].')).toBe(
      '<p>Migration is <span class="surfdoc-status" data-status="shipped">shipped</span>.</p>'
    );
    expect(engine.toHtml('Grew :evidence[tier=1 source="Annual report"]')).toBe(
      '<p>Grew <span class="surfdoc-evidence" data-tier="1">Annual report</span></p>'
    );
  });

  it('should leave double-colon text alone', () => {
    expect(engine.toHtml('a::status[value=x]')).toBe('<p>a::status[value=x]</p>');
  });

  it('should render markers as badges in the terminal', () => {
    const output = new AnsiRenderer().render(parse('Migration is :status[value=shipped] :evidence[source="Audit"]').document, {
      color: false,
    });
    expect(output).toBe('Migration is [shipped] [Audit]');
  });
});
