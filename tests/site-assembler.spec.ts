/**
 * Tests for multi-page site assembly
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { parse } from '../src/parser/index.js';
import { BlockBuilder } from '../src/blocks/index.js';
import {
  SiteAssembler,
  assembleSite,
  orderPages,
  planSite,
  siteName,
  normalizeRoute,
  routeToPath,
  routeHref,
} from '../src/site/index.js';
import type { PageBlock, SiteBlock } from '../src/model/index.js';

const SITE = [
  '::site[name="Docs", domain="example.com"]',
  '::page[route="/two", title="Two", order=2]',
  'Second.',
  '::',
  '::page[title="One", order=1]',
  'First.',
  '::',
  '::',
].join('\n');

function firstSite(text: string): SiteBlock {
  const node = new BlockBuilder().build(text).nodes.find((n): n is SiteBlock => n.kind === 'site');
  if (!node) throw new Error('no site block');
  return node;
}

function pagesOf(site: SiteBlock): PageBlock[] {
  return site.children.filter((n): n is PageBlock => n.kind === 'page');
}

describe('SiteAssembler', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should render pages in order with a navigation index', async () => {
    const site = await assembleSite(parse(SITE).document);

    expect(site.name).toBe('Docs');
    expect(site.domain).toBe('example.com');
    expect(site.format).toBe('html');
    expect(site.nav).toEqual([
      { id: 'one', title: 'One', route: '/', position: 0 },
      { id: 'two', title: 'Two', route: '/two', position: 1 },
    ]);
    expect(site.pages.map(page => page.path)).toEqual(['index.html', 'two/index.html']);
    expect(site.pages[1].size).toBe(site.pages[1].content.length);
    expect(site.pages[1].oversized).toBe(false);
  });

  it('should mark the current page and link every page', async () => {
    const site = await assembleSite(parse(SITE).document);
    const two = site.pages[1].content;

    expect(two).toContain('<title>Two | Docs</title>');
    expect(two).toContain('<link rel="canonical" href="https://example.com/two/index.html">');
    expect(two).toContain('<a href="/index.html" class="site-name">Docs</a>\n<a href="/index.html">One</a>');
    expect(two).toContain('<a href="/two/index.html" class="active" aria-current="page">Two</a>');
    expect(two).toContain('<main class="surfdoc">\n<section class="surfdoc-page" data-route="/two" aria-label="Two">\n<p>Second.</p>\n</section>\n</main>');
    expect(two).toContain('<footer class="surfdoc-site-footer"><p>Docs</p></footer>');
    expect(two).not.toContain('First.');
  });

  it('should render markdown pages', async () => {
    const site = await assembleSite(parse(SITE).document, { format: 'markdown' });
    expect(site.pages[0].path).toBe('index.md');
    expect(site.pages[0].content).toBe('# One\n\n*Docs*\n\n- **[One](/)**\n- [Two](/two)\n\n---\n\nFirst.');
  });

  it('should render terminal pages', async () => {
    const site = await assembleSite(parse(SITE).document, { format: 'ansi', config: { color: false } });
    expect(site.pages[1].path).toBe('two/index.txt');
    expect(site.pages[1].content).toBe(`Docs\nOne | Two\n${'─'.repeat(40)}\n\nSecond.`);
  });

  it('should reject a document without a site', async () => {
    await expect(assembleSite(parse('Just prose').document)).rejects.toThrow(
      'Document has no ::site block to assemble'
    );
  });

  it('should stop when cancelled', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stopped by caller'));
    await expect(new SiteAssembler({ signal: controller.signal }).assemble(parse(SITE).document)).rejects.toThrow(
      'stopped by caller'
    );
  });

  it('should flag pages over the size limit', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const site = await assembleSite(parse(SITE).document, { config: { maxPageSize: 10 } });

    expect(site.pages.every(page => page.oversized)).toBe(true);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith(
      `⚠️ Page /two is ${site.pages[1].size} characters, over the 10 limit`
    );
  });

  it('should assemble only the first site', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const site = await assembleSite(parse(`${SITE}\n\n::site[name="Other"]\n::page\nx\n::\n::`).document);

    expect(site.name).toBe('Docs');
    expect(warn).toHaveBeenCalledWith('⚠️ Document has 2 site blocks; only the first is assembled');
  });
});

describe('planSite', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should derive ids, routes and titles', () => {
    const plan = planSite(firstSite('::site\n::page\na\n::\n::page\nb\n::\n::page[route="docs/"]\nc\n::\n::'));
    expect(plan.map(item => item.entry)).toEqual([
      { id: 'page-1', title: 'Home', route: '/', position: 0 },
      { id: 'page-2', title: 'Page 2', route: '/page-2', position: 1 },
      { id: 'docs', title: 'Docs', route: '/docs', position: 2 },
    ]);
  });

  it('should prefer an explicit id and keep ids unique', () => {
    const plan = planSite(
      firstSite('::site\n::page[id=intro, title="A"]\na\n::\n::page[title="Intro"]\nb\n::\n::')
    );
    expect(plan.map(item => item.entry.id)).toEqual(['intro', 'intro-2']);
  });

  it('should keep a declared root route when an earlier page declares none', async () => {
    const text = '::site\n::page[title="Intro"]\nIntro body\n::\n::page[route="/", title="Home"]\nHome body\n::\n::';
    expect(planSite(firstSite(text)).map(item => item.entry)).toEqual([
      { id: 'intro', title: 'Intro', route: '/intro', position: 0 },
      { id: 'home', title: 'Home', route: '/', position: 1 },
    ]);

    const { document, diagnostics } = parse(text);
    expect(diagnostics).toEqual([]);
    const site = await assembleSite(document, { format: 'markdown' });
    expect(site.pages.map(page => page.path)).toEqual(['intro/index.md', 'index.md']);
    expect(site.pages[1].content).toContain('Home body');
  });

  it('should not derive a route that a later page declares', () => {
    const plan = planSite(firstSite('::site\n::page\na\n::\n::page[title="Docs"]\nb\n::\n::page[route="/docs"]\nc\n::\n::'));
    expect(plan.map(item => item.entry.route)).toEqual(['/', '/docs-2', '/docs']);
  });

  it('should skip a page whose route is taken', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const plan = planSite(firstSite('::site\n::page[route="/a"]\nx\n::\n::page[route="a/"]\ny\n::\n::'));

    expect(plan.map(item => item.entry.route)).toEqual(['/a']);
    expect(warn).toHaveBeenCalledWith("⚠️ Skipping page 'a-2': route /a is already used");
  });
});

describe('orderPages', () => {
  it('should put ordered pages first and keep document order for ties', () => {
    const site = firstSite(
      '::site\n::page[title="B", order=1]\nx\n::\n::page[title="A"]\nx\n::\n::page[title="C", order=1]\nx\n::\n::page[title="D", order=0]\nx\n::\n::'
    );
    expect(orderPages(pagesOf(site)).map(page => page.title)).toEqual(['D', 'B', 'C', 'A']);
  });
});

describe('siteName', () => {
  it('should fall back through attribute, property and front matter', () => {
    expect(siteName(firstSite('::site[name="Attr"]\nname: Prop\n::'))).toBe('Attr');
    expect(siteName(firstSite('::site\nname: Prop\n::'))).toBe('Prop');

    const { document } = parse('::site\n::page\nx\n::\n::', { frontMatter: { title: 'From Front Matter' } });
    expect(siteName(firstSite('::site\n::'), document)).toBe('From Front Matter');
    expect(siteName(firstSite('::site\n::'))).toBe('SurfDoc Site');
  });
});

describe('routes', () => {
  it('should normalise routes', () => {
    expect(normalizeRoute('')).toBe('/');
    expect(normalizeRoute('/')).toBe('/');
    expect(normalizeRoute('docs/')).toBe('/docs');
    expect(normalizeRoute(' /guide/setup/ ')).toBe('/guide/setup');
  });

  it('should map routes to files and links', () => {
    expect(routeToPath('/', '.html')).toBe('index.html');
    expect(routeToPath('/guide/setup', '.md')).toBe('guide/setup/index.md');
    expect(routeHref('/docs')).toBe('/docs/index.html');
  });
});
