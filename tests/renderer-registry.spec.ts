/**
 * Tests for the renderer registry and base renderer
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { ZodError } from 'zod';
import { BaseDocumentRenderer, RendererRegistry } from '../src/base/index.js';
import type { RenderConfig, SitePageContext } from '../src/base/index.js';
import type { DocumentNode } from '../src/model/index.js';
import { parse } from '../src/parser/index.js';
import {
  AnsiRenderer,
  HtmlRenderer,
  MarkdownRenderer,
  createDefaultRenderers,
  renderDocument,
} from '../src/renderers/index.js';

class SummaryRenderer extends BaseDocumentRenderer {
  readonly format = 'markdown';
  readonly extension = '.sum';

  renderNodes(nodes: readonly DocumentNode[], config: RenderConfig): string {
    return `${nodes.length} nodes, ${config.theme}`;
  }

  renderSitePage(context: SitePageContext): string {
    return context.entry.title;
  }
}

describe('RendererRegistry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should hold the built-in renderers', () => {
    const registry = createDefaultRenderers();
    expect(registry.getFormats()).toEqual(['html', 'markdown', 'ansi']);
    expect(registry.getRenderer('html')).toBeInstanceOf(HtmlRenderer);
    expect(registry.getRenderers()).toHaveLength(3);
  });

  it('should find renderers by output file', () => {
    const registry = createDefaultRenderers();
    expect(registry.getRendererForFile('out/page.md')).toBeInstanceOf(MarkdownRenderer);
    expect(registry.getRendererForFile('page.txt')).toBeInstanceOf(AnsiRenderer);
    expect(registry.getRendererForFile('page.pdf')).toBeNull();
  });

  it('should report missing formats', () => {
    const registry = new RendererRegistry();
    expect(registry.getRenderer('html')).toBeNull();
    expect(() => registry.requireRenderer('html')).toThrow('No renderer registered for format: html');
  });

  it('should warn when a format is registered twice', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const registry = createDefaultRenderers();
    const replacement = new SummaryRenderer();
    registry.register(replacement);

    expect(warn).toHaveBeenCalledWith('⚠️ Renderer for markdown already registered, overwriting');
    expect(registry.requireRenderer('markdown')).toBe(replacement);
  });
});

describe('BaseDocumentRenderer', () => {
  it('should resolve configuration before rendering', () => {
    const { document } = parse('Intro\n\n::summary\nx\n::');
    const renderer = new SummaryRenderer();
    expect(renderer.render(document)).toBe('2 nodes, dark');
    expect(renderer.render(document, { theme: 'light' })).toBe('2 nodes, light');
    expect(() => renderer.render(document, { lang: '' })).toThrow(ZodError);
  });
});

describe('renderDocument', () => {
  it('should render with the default renderer for a format', () => {
    const { document } = parse('::cta[label="Go", href="/start"]\n::');
    expect(renderDocument(document, 'markdown')).toBe('[Go](/start)');
    expect(renderDocument(document, 'ansi', { color: false })).toBe('[CTA] Go (/start)');
  });
});
