/**
 * Tests for HTML rendering
 */
import { describe, it, expect } from 'vitest';
import { parse } from '../src/parser/index.js';
import { HtmlRenderer, highlightedLines } from '../src/renderers/index.js';
import type { RenderConfigInput } from '../src/base/index.js';

const renderer = new HtmlRenderer();

function render(text: string, config: RenderConfigInput = {}): string {
  return renderer.render(parse(text).document, config);
}

/**
 * Article content without the wrapper or stylesheet
 */
function body(text: string): string {
  const html = render(text, { css: 'omit' });
  const prefix = '<article class="surfdoc">\n';
  const suffix = '\n</article>';
  expect(html.startsWith(prefix)).toBe(true);
  expect(html.endsWith(suffix)).toBe(true);
  return html.slice(prefix.length, -suffix.length);
}

describe('HtmlRenderer', () => {
  describe('blocks', () => {
    it('should render a callout with its label and markdown body', () => {
      expect(body('::callout[type=warning, title="Heads up"]\nMind the **gap**.\n::')).toBe(
        '<div class="surfdoc-callout surfdoc-callout-warning" role="alert"><strong>Warning: Heads up</strong>' +
          '<p>Mind the <strong>gap</strong>.</p></div>'
      );
      expect(body('::callout[type=tip]\nx\n::')).toContain('role="note"><strong>Tip</strong>');
    });

    it('should render a data table', () => {
      expect(body('::data[sortable]\n| Name | Qty |\n|---|---|\n| Apple | 3 |\n::')).toBe(
        '<table class="surfdoc-data" data-sortable="true"><thead><tr><th scope="col">Name</th><th scope="col">Qty</th></tr></thead>' +
          '<tbody><tr><td>Apple</td><td>3</td></tr></tbody></table>'
      );
    });

    it('should render code with escaping and highlighted lines', () => {
      expect(body('::code[lang=ts, file="a.ts", highlight=[2]]\nlet a = 1;\nif (a < 2) {}\n::')).toBe(
        '<div class="surfdoc-code-file">a.ts</div><pre class="surfdoc-code" aria-label="ts code"><code class="language-ts">' +
          'let a = 1;\n<span class="highlight">if (a &lt; 2) {}</span></code></pre>'
      );
    });

    it('should render tasks as disabled checkboxes', () => {
      expect(body('::tasks\n- [x] Ship @dana\n- [ ] Docs\n::')).toBe(
        '<ul class="surfdoc-tasks"><li><input type="checkbox" disabled checked> Ship <span class="assignee">@dana</span></li>' +
          '<li><input type="checkbox" disabled> Docs</li></ul>'
      );
    });

    it('should keep the body of blocks whose content did not parse', () => {
      expect(body('::tasks\nShip the release notes\n::')).toBe(
        '<div class="surfdoc-tasks"><p>Ship the release notes</p></div>'
      );
      expect(body('::data[format=json]\n{"q4": 4200}\n::')).toBe('<pre class="surfdoc-data">{&quot;q4&quot;: 4200}</pre>');
      expect(body('::pricing-table\n|---|\n::')).toBe('<pre class="surfdoc-pricing">|---|</pre>');
    });

    it('should render a decision with the chosen option marked', () => {
      expect(body('::decision[status=accepted, options=["A", "B"], outcome=B]\nWhy.\n::')).toBe(
        '<div class="surfdoc-decision surfdoc-decision-accepted" role="note" aria-label="Decision: accepted">' +
          '<span class="status">accepted</span><ul class="options"><li>A</li><li class="chosen">B</li></ul>' +
          '<p class="outcome"><strong>Outcome:</strong> B</p><p>Why.</p></div>'
      );
    });

    it('should render a metric with a spoken label', () => {
      expect(body('::metric[label="MRR", value=4200, unit=usd, trend=up]\n::')).toBe(
        '<div class="surfdoc-metric" role="group" aria-label="MRR: 4200 usd, trending up"><span class="label">MRR</span>' +
          '<span class="value">4200</span><span class="unit">usd</span>' +
          '<span class="trend trend-up" aria-hidden="true">↑</span></div>'
      );
    });

    it('should render a figure with a width limit', () => {
      expect(body('::figure[src="a.png", alt="Chart", caption="Q1", width=640]\n::')).toBe(
        '<figure class="surfdoc-figure"><img src="a.png" alt="Chart" style="max-width: 640px"><figcaption>Q1</figcaption></figure>'
      );
    });

    it('should render a quote with attribution', () => {
      expect(body('::quote[by="Ada", cite="Notes"]\nHello\n::')).toBe(
        '<div class="surfdoc-quote"><blockquote><p>Hello</p></blockquote>' +
          '<p class="attribution">— Ada, <cite>Notes</cite></p></div>'
      );
    });

    it('should render a testimonial', () => {
      expect(body('::testimonial[author="Sam", role="CTO", company="Acme"]\nGreat.\n::')).toBe(
        '<figure class="surfdoc-testimonial" role="figure" aria-label="Testimonial from Sam">' +
          '<blockquote><p>Great.</p></blockquote>' +
          '<figcaption><span class="author">Sam</span><span class="role">CTO, Acme</span></figcaption></figure>'
      );
    });

    it('should render site and page blocks inline', () => {
      expect(body('::site[name="Acme"]\n::page[route="/", title="Home"]\nWelcome.\n::\n::')).toBe(
        '<div class="surfdoc-site" hidden data-name="Acme"></div>\n' +
          '<section class="surfdoc-page" data-route="/" aria-label="Home">\n<p>Welcome.</p>\n</section>'
      );
    });

    it('should give every tabs block unique ids and emit the script once', () => {
      const html = body('::tabs\n## A\none\n## B\ntwo\n::\n\n::tabs\n## C\nthree\n::');
      expect(html).toContain('id="surfdoc-tabs-1-tab-0"');
      expect(html).toContain('id="surfdoc-tabs-1-tab-1"');
      expect(html).toContain('id="surfdoc-tabs-2-tab-0"');
      expect(html).toContain(
        '<div class="tab-panel" role="tabpanel" id="surfdoc-tabs-1-panel-1" aria-labelledby="surfdoc-tabs-1-tab-1" tabindex="0" hidden><p>two</p></div>'
      );
      expect(html.split('<script>')).toHaveLength(2);
    });

    it('should not emit the tabs script without tabs', () => {
      expect(body('Just prose.')).toBe('<p>Just prose.</p>');
    });

    it('should escape an unknown block body', () => {
      expect(body('::widget[size=3]\n<b>hi</b>\n::')).toBe(
        '<div class="surfdoc-unknown" role="note" data-name="widget">&lt;b&gt;hi&lt;/b&gt;</div>'
      );
    });
  });

  describe('escaping', () => {
    it('should neutralise script URLs', () => {
      expect(body('::cta[label="Go", href="javascript:alert(1)"]\n::')).toBe(
        '<a class="surfdoc-cta surfdoc-cta-secondary" href="#">Go</a>'
      );
      expect(body('::cta[label="Go", href="/start", primary]\n::')).toBe(
        '<a class="surfdoc-cta surfdoc-cta-primary" href="/start">Go</a>'
      );
    });

    it('should neutralise script URLs in prose links and images', () => {
      expect(body('[click](javascript:alert(1))')).toBe('<p><a href="#">click</a></p>');
      expect(body('![x](data:text/html;base64,AAAA)')).toBe('<p><img src="#" alt="x"></p>');
      expect(body('[ok](/docs)')).toBe('<p><a href="/docs">ok</a></p>');
    });

    it('should escape attribute values', () => {
      expect(body('::figure[src="a.png", alt="\\"><script>"]\n::')).toBe(
        '<figure class="surfdoc-figure"><img src="a.png" alt="&quot;&gt;&lt;script&gt;"></figure>'
      );
    });

    it('should escape raw HTML in prose', () => {
      const html = body('Hello <script>alert(1)</script>');
      expect(html).not.toContain('<script>');
      expect(html).toContain('&lt;script&gt;');
    });
  });

  describe('stylesheet', () => {
    it('should emit a single style element before the article', () => {
      const html = render('Hello');
      expect(html.startsWith('<style>\n')).toBe(true);
      expect(html.split('<style>')).toHaveLength(2);
      expect(html).toContain('  --bg: #0a0a0f;');
      expect(html.endsWith('</style>\n<article class="surfdoc">\n<p>Hello</p>\n</article>')).toBe(true);
    });

    it('should switch theme', () => {
      expect(render('Hello', { theme: 'light' })).toContain('  --bg: #ffffff;');
    });

    it('should apply a safe accent override and ignore an unsafe one', () => {
      const safe = render('::style\naccent: #ff6600\n::');
      expect(safe).toContain('  --accent: #ff6600;');
      expect(safe).not.toContain('--accent: #3b82f6');

      const unsafe = render('::style\naccent: red;}</style>\n::');
      expect(unsafe).toContain('  --accent: #3b82f6;');
      expect(unsafe.split('</style>')).toHaveLength(2);
    });

    it('should import web fonts for font presets', () => {
      const html = render('::style\nfont: inter\n::');
      expect(html).toContain(
        "@import url('https://fonts.googleapis.com/css2?family=Inter:wght@400;500;600;700&display=swap');"
      );
      expect(html).toContain("  --font-heading: 'Inter', -apple-system, BlinkMacSystemFont, sans-serif;");
    });
  });

  describe('standalone pages', () => {
    it('should wrap the article in a complete page', () => {
      const { document } = parse('Hello', { frontMatter: { title: 'Doc & Co' } });
      const html = renderer.render(document, {
        standalone: true,
        css: 'omit',
        sourcePath: 'docs/a.surf',
        description: 'Desc',
      });
      expect(html).toBe(
        [
          '<!-- Built with SurfDoc, source: docs/a.surf -->',
          '<!DOCTYPE html>',
          '<html lang="en">',
          '<head>',
          '<meta charset="utf-8">',
          '<meta name="viewport" content="width=device-width, initial-scale=1">',
          '<meta name="generator" content="SurfDoc v0.1">',
          '<title>Doc &amp; Co</title>',
          '<meta name="description" content="Desc">',
          '<link rel="alternate" type="text/surfdoc" href="docs/a.surf">',
          '</head>',
          '<body>',
          '<article class="surfdoc">',
          '<p>Hello</p>',
          '</article>',
          '</body>',
          '</html>',
        ].join('\n')
      );
    });

    it('should prefer the configured title and add a canonical link', () => {
      const { document } = parse('Hello', { frontMatter: { title: 'Ignored' } });
      const html = renderer.render(document, {
        standalone: true,
        css: 'omit',
        title: 'Chosen',
        canonicalUrl: 'https://example.com/doc',
      });
      expect(html).toContain('<title>Chosen</title>');
      expect(html).toContain('<link rel="canonical" href="https://example.com/doc">');
    });
  });

  it('should expand highlight ranges', () => {
    expect([...highlightedLines(['1', '3-5', 'x', '4'], 10)]).toEqual([1, 3, 4, 5]);
  });

  it('should limit highlight ranges to the lines of the body', () => {
    expect([...highlightedLines(['2-20000000'], 3)]).toEqual([2, 3]);
    expect([...highlightedLines(['0-1', '9'], 3)]).toEqual([1]);
    expect(body('::code[lang=ts, highlight="1-20000000"]\nx\n::')).toBe(
      '<pre class="surfdoc-code" aria-label="ts code"><code class="language-ts"><span class="highlight">x</span></code></pre>'
    );
  });
});
