/**
 * HTML Renderer
 *
 * Semantic markup with `surfdoc-*` classes and ARIA roles. Prose and leaf
 * bodies go through the prose engine (raw HTML escaped); every attribute
 * value is escaped before it reaches the output.
 *
 * @since 2026-10-18
 */

import { BaseDocumentRenderer } from '../base/Renderer.js';
import type { SitePageContext } from '../base/Renderer.js';
import type { RenderConfig } from '../base/RenderConfig.js';
import { walkBlocks } from '../model/traverse.js';
import { unparsedBody } from '../blocks/content.js';
import type {
  Block,
  CalloutType,
  CodeBlock,
  DecisionBlock,
  DocumentNode,
  MetricBlock,
  SurfDocument,
  TabsBlock,
  TestimonialBlock,
} from '../model/types.js';
import { ProseEngine, defaultProseEngine } from '../markdown/ProseEngine.js';
import { escapeHtml, isScriptUrl } from '../markdown/escape.js';
import { routeHref } from '../site/routes.js';
import { applyStyleProperties, collectStyleOverrides, styleElement } from './stylesheet.js';
import type { StyleOverrides } from './stylesheet.js';

export const GENERATOR = 'SurfDoc v0.1';

const CALLOUT_LABELS: Readonly<Record<CalloutType, string>> = {
  info: 'Info',
  warning: 'Warning',
  danger: 'Danger',
  tip: 'Tip',
  note: 'Note',
  success: 'Success',
};

const TREND_ARROWS = { up: '↑', down: '↓', flat: '→' } as const;

const TABS_SCRIPT =
  `<script>document.querySelectorAll('.surfdoc-tabs').forEach(t=>{t.querySelectorAll('[role="tab"]').forEach(b=>{b.onclick=()=>{` +
  `t.querySelectorAll('[role="tab"]').forEach(e=>{e.classList.remove('active');e.setAttribute('aria-selected','false');e.tabIndex=-1});` +
  `b.classList.add('active');b.setAttribute('aria-selected','true');b.tabIndex=0;` +
  `t.querySelectorAll('[role="tabpanel"]').forEach(p=>{p.classList.remove('active');p.hidden=true});` +
  `var panel=document.getElementById(b.getAttribute('aria-controls'));if(panel){panel.classList.add('active');panel.hidden=false}}})})</script>`;

interface HtmlContext {
  /** Tabs blocks rendered so far; keeps element ids unique within one output */
  tabs: number;
}

/**
 * Neutralise script URLs; everything else is kept and escaped
 */
function safeUrl(url: string): string {
  return isScriptUrl(url) ? '#' : escapeHtml(url);
}

/**
 * `640` → `640px`; lengths with a unit are kept; anything else is dropped
 */
function cssWidth(width: string): string | undefined {
  const match = /^(\d+(?:\.\d+)?)(px|%|rem|em|vw)?$/.exec(width.trim());
  if (!match) return undefined;
  return `${match[1]}${match[2] ?? 'px'}`;
}

/**
 * Line numbers named by `highlight` entries such as `3` or `5-7`,
 * limited to the first `lineCount` lines
 */
export function highlightedLines(specs: readonly string[], lineCount: number): Set<number> {
  const lines = new Set<number>();
  for (const spec of specs) {
    const match = /^(\d+)(?:\s*-\s*(\d+))?$/.exec(spec.trim());
    if (!match) continue;
    const from = Math.max(1, Number(match[1]));
    const to = Math.min(match[2] === undefined ? Number(match[1]) : Number(match[2]), lineCount);
    for (let line = from; line <= to; line++) lines.add(line);
  }
  return lines;
}

function table(className: string, headers: readonly string[], rows: readonly string[][], extra = '', rowHeaders = false): string {
  const head = headers.length > 0
    ? `<thead><tr>${headers.map(h => `<th scope="col">${escapeHtml(h)}</th>`).join('')}</tr></thead>`
    : '';
  const body = rows
    .map(row => {
      const cells = row.map((cell, i) =>
        rowHeaders && i === 0 ? `<th scope="row">${escapeHtml(cell)}</th>` : `<td>${escapeHtml(cell)}</td>`
      );
      return `<tr>${cells.join('')}</tr>`;
    })
    .join('');
  return `<table class="${className}"${extra}>${head}<tbody>${body}</tbody></table>`;
}

export class HtmlRenderer extends BaseDocumentRenderer {
  readonly format = 'html';
  readonly extension = '.html';

  constructor(private readonly prose: ProseEngine = defaultProseEngine) {
    super();
  }

  renderNodes(nodes: readonly DocumentNode[], _config: RenderConfig): string {
    const context: HtmlContext = { tabs: 0 };
    const html = this.renderList(nodes, context);
    return context.tabs > 0 ? `${html}\n${TABS_SCRIPT}` : html;
  }

  protected renderDocument(document: SurfDocument, config: RenderConfig): string {
    const style = config.css === 'inline' ? styleElement(config.theme, collectStyleOverrides(document.nodes)) : '';
    const article = `<article class="surfdoc">\n${this.renderNodes(document.nodes, config)}\n</article>`;

    if (!config.standalone) {
      return style ? `${style}\n${article}` : article;
    }

    const frontMatter = document.frontMatter ?? {};
    const title = config.title ?? frontMatter.title ?? 'SurfDoc';
    const description = config.description ?? frontMatter.description;
    const head = [
      '<meta charset="utf-8">',
      '<meta name="viewport" content="width=device-width, initial-scale=1">',
      `<meta name="generator" content="${GENERATOR}">`,
      `<title>${escapeHtml(title)}</title>`,
    ];
    if (description !== undefined) head.push(`<meta name="description" content="${escapeHtml(description)}">`);
    if (config.canonicalUrl !== undefined) head.push(`<link rel="canonical" href="${safeUrl(config.canonicalUrl)}">`);
    head.push(`<link rel="alternate" type="text/surfdoc" href="${safeUrl(config.sourcePath)}">`);
    if (style) head.push(style);

    return [
      `<!-- Built with SurfDoc, source: ${escapeHtml(config.sourcePath).replace(/--/g, '- -')} -->`,
      '<!DOCTYPE html>',
      `<html lang="${escapeHtml(config.lang)}">`,
      '<head>',
      ...head,
      '</head>',
      '<body>',
      article,
      '</body>',
      '</html>',
    ].join('\n');
  }

  renderSitePage(context: SitePageContext, config: RenderConfig): string {
    const { site, page, entry, nav, siteName } = context;

    let style = '';
    if (config.css === 'inline') {
      const overrides: StyleOverrides = { variables: [], imports: [] };
      applyStyleProperties(site.properties, overrides);
      for (const node of site.children) {
        if (node.kind === 'style') applyStyleProperties(node.properties, overrides);
      }
      walkBlocks(page.children, block => {
        if (block.kind === 'style') applyStyleProperties(block.properties, overrides);
      });
      style = styleElement(config.theme, overrides);
    }

    const links = nav.map(item => {
      const current = item.id === entry.id ? ' class="active" aria-current="page"' : '';
      return `<a href="${safeUrl(routeHref(item.route))}"${current}>${escapeHtml(item.title)}</a>`;
    });
    const description = config.description ?? context.document.frontMatter?.description;

    const head = [
      '<meta charset="utf-8">',
      '<meta name="viewport" content="width=device-width, initial-scale=1">',
      `<meta name="generator" content="${GENERATOR}">`,
      `<title>${escapeHtml(`${entry.title} | ${siteName}`)}</title>`,
    ];
    if (description !== undefined) head.push(`<meta name="description" content="${escapeHtml(description)}">`);
    if (site.domain !== undefined) {
      head.push(`<link rel="canonical" href="${safeUrl(`https://${site.domain.replace(/\/+$/, '')}${routeHref(entry.route)}`)}">`);
    }
    if (style) head.push(style);

    return [
      '<!DOCTYPE html>',
      `<html lang="${escapeHtml(config.lang)}">`,
      '<head>',
      ...head,
      '</head>',
      '<body>',
      `<nav class="surfdoc-site-nav" role="navigation" aria-label="Site navigation">`,
      `<a href="/index.html" class="site-name">${escapeHtml(siteName)}</a>`,
      ...links,
      '</nav>',
      '<main class="surfdoc">',
      this.renderNodes([page], config),
      '</main>',
      `<footer class="surfdoc-site-footer"><p>${escapeHtml(siteName)}</p></footer>`,
      '</body>',
      '</html>',
    ].join('\n');
  }

  private renderList(nodes: readonly DocumentNode[], context: HtmlContext): string {
    return nodes
      .map(node => (node.kind === 'prose' ? this.prose.toHtml(node.text) : this.renderBlock(node, context)))
      .filter(html => html.length > 0)
      .join('\n');
  }

  private renderBlock(block: Block, context: HtmlContext): string {
    const unparsed = unparsedBody(block);
    if (unparsed !== undefined) return this.renderUnparsed(block, unparsed);

    switch (block.kind) {
      case 'callout': {
        const heading = CALLOUT_LABELS[block.calloutType] + (block.title ? `: ${escapeHtml(block.title)}` : '');
        const role = block.calloutType === 'danger' || block.calloutType === 'warning' ? 'alert' : 'note';
        return `<div class="surfdoc-callout surfdoc-callout-${block.calloutType}" role="${role}"><strong>${heading}</strong>${this.prose.toHtml(block.body)}</div>`;
      }
      case 'data':
        return table('surfdoc-data', block.headers, block.rows, block.sortable ? ' data-sortable="true"' : '');
      case 'code':
        return this.renderCode(block);
      case 'tasks': {
        const items = block.items.map(item => {
          const checkbox = `<input type="checkbox" disabled${item.done ? ' checked' : ''}>`;
          const assignee = item.assignee ? ` <span class="assignee">@${escapeHtml(item.assignee)}</span>` : '';
          return `<li>${checkbox} ${escapeHtml(item.text)}${assignee}</li>`;
        });
        return `<ul class="surfdoc-tasks">${items.join('')}</ul>`;
      }
      case 'decision':
        return this.renderDecision(block);
      case 'metric':
        return this.renderMetric(block);
      case 'summary':
        return `<div class="surfdoc-summary" role="doc-abstract">${this.prose.toHtml(block.body)}</div>`;
      case 'figure': {
        const alt = block.alt ?? block.caption ?? '';
        const width = block.width ? cssWidth(block.width) : undefined;
        const img = `<img src="${safeUrl(block.src)}" alt="${escapeHtml(alt)}"${width ? ` style="max-width: ${width}"` : ''}>`;
        const caption = block.caption ? `<figcaption>${escapeHtml(block.caption)}</figcaption>` : '';
        return `<figure class="surfdoc-figure">${img}${caption}</figure>`;
      }
      case 'tabs':
        return this.renderTabs(block, context);
      case 'columns': {
        const columns = block.columns.map(
          column => `<div class="surfdoc-column">${this.renderList(column.children, context)}</div>`
        );
        return `<div class="surfdoc-columns" role="group" data-cols="${block.columns.length}">${columns.join('')}</div>`;
      }
      case 'quote': {
        let attribution = '';
        if (block.attribution) {
          const cite = block.cite ? `, <cite>${escapeHtml(block.cite)}</cite>` : '';
          attribution = `<p class="attribution">— ${escapeHtml(block.attribution)}${cite}</p>`;
        } else if (block.cite) {
          attribution = `<p class="attribution"><cite>${escapeHtml(block.cite)}</cite></p>`;
        }
        return `<div class="surfdoc-quote"><blockquote>${this.prose.toHtml(block.body)}</blockquote>${attribution}</div>`;
      }
      case 'cta': {
        const variant = block.primary ? 'primary' : 'secondary';
        const icon = block.icon
          ? `<span class="icon" data-icon="${escapeHtml(block.icon)}" aria-hidden="true"></span>`
          : '';
        return `<a class="surfdoc-cta surfdoc-cta-${variant}" href="${safeUrl(block.href)}">${icon}${escapeHtml(block.label)}</a>`;
      }
      case 'hero-image': {
        const alt = escapeHtml(block.alt ?? 'Hero image');
        return `<div class="surfdoc-hero-image" role="img" aria-label="${alt}"><img src="${safeUrl(block.src)}" alt="${alt}"></div>`;
      }
      case 'testimonial':
        return this.renderTestimonial(block);
      case 'style': {
        const properties = block.properties.map(p => `${p.key}: ${p.value}`).join('; ');
        return `<div class="surfdoc-style" hidden data-properties="${escapeHtml(properties)}"></div>`;
      }
      case 'faq': {
        const items = block.items.map(
          item =>
            `<details><summary>${escapeHtml(item.question)}</summary><div class="faq-answer">${this.prose.toHtml(item.answer)}</div></details>`
        );
        return `<div class="surfdoc-faq">${items.join('')}</div>`;
      }
      case 'pricing-table':
        return table('surfdoc-pricing', block.headers, block.rows, ' aria-label="Pricing comparison"', true);
      case 'site': {
        const data = [
          block.domain !== undefined ? ` data-domain="${escapeHtml(block.domain)}"` : '',
          block.name !== undefined ? ` data-name="${escapeHtml(block.name)}"` : '',
        ].join('');
        const meta = `<div class="surfdoc-site" hidden${data}></div>`;
        const children = this.renderList(block.children, context);
        return children ? `${meta}\n${children}` : meta;
      }
      case 'page': {
        const label = block.title ?? block.route ?? 'Page';
        const data = [
          block.route !== undefined ? ` data-route="${escapeHtml(block.route)}"` : '',
          block.layout !== undefined ? ` data-layout="${escapeHtml(block.layout)}"` : '',
        ].join('');
        return `<section class="surfdoc-page"${data} aria-label="${escapeHtml(label)}">\n${this.renderList(block.children, context)}\n</section>`;
      }
      case 'unknown':
        return `<div class="surfdoc-unknown" role="note" data-name="${escapeHtml(block.tag)}">${escapeHtml(block.rawBody)}</div>`;
    }
  }

  /**
   * Tables that yielded no rows keep their text verbatim; task lists fall
   * back to prose
   */
  private renderUnparsed(block: Block, body: string): string {
    if (block.kind === 'data' || block.kind === 'pricing-table') {
      const className = block.kind === 'data' ? 'surfdoc-data' : 'surfdoc-pricing';
      return `<pre class="${className}">${escapeHtml(body)}</pre>`;
    }
    return `<div class="surfdoc-${block.kind}">${this.prose.toHtml(body)}</div>`;
  }

  private renderCode(block: CodeBlock): string {
    const bodyLines = block.body.split('\n');
    const highlighted = highlightedLines(block.highlight, bodyLines.length);
    const lines = bodyLines.map((line, index) => {
      const escaped = escapeHtml(line);
      return highlighted.has(index + 1) ? `<span class="highlight">${escaped}</span>` : escaped;
    });
    const label = block.lang ? ` aria-label="${escapeHtml(block.lang)} code"` : '';
    const codeClass = block.lang ? ` class="language-${escapeHtml(block.lang)}"` : '';
    const file = block.file ? `<div class="surfdoc-code-file">${escapeHtml(block.file)}</div>` : '';
    return `${file}<pre class="surfdoc-code"${label}><code${codeClass}>${lines.join('\n')}</code></pre>`;
  }

  private renderDecision(block: DecisionBlock): string {
    const parts = [`<span class="status">${block.status}</span>`];
    if (block.date) parts.push(`<span class="date">${escapeHtml(block.date)}</span>`);
    if (block.deciders.length > 0) {
      parts.push(`<span class="deciders">Deciders: ${escapeHtml(block.deciders.join(', '))}</span>`);
    }
    if (block.options.length > 0) {
      const options = block.options.map(option =>
        option === block.outcome ? `<li class="chosen">${escapeHtml(option)}</li>` : `<li>${escapeHtml(option)}</li>`
      );
      parts.push(`<ul class="options">${options.join('')}</ul>`);
    }
    if (block.outcome) parts.push(`<p class="outcome"><strong>Outcome:</strong> ${escapeHtml(block.outcome)}</p>`);
    parts.push(this.prose.toHtml(block.body));
    return `<div class="surfdoc-decision surfdoc-decision-${block.status}" role="note" aria-label="Decision: ${block.status}">${parts.join('')}</div>`;
  }

  private renderMetric(block: MetricBlock): string {
    let spoken = `${block.label}: ${block.displayValue}`;
    if (block.unit) spoken += ` ${block.unit}`;
    if (block.trend) spoken += `, trending ${block.trend}`;

    const parts = [
      `<span class="label">${escapeHtml(block.label)}</span>`,
      `<span class="value">${escapeHtml(block.displayValue)}</span>`,
    ];
    if (block.unit) parts.push(`<span class="unit">${escapeHtml(block.unit)}</span>`);
    if (block.trend) {
      parts.push(`<span class="trend trend-${block.trend}" aria-hidden="true">${TREND_ARROWS[block.trend]}</span>`);
    }
    return `<div class="surfdoc-metric" role="group" aria-label="${escapeHtml(spoken)}">${parts.join('')}</div>`;
  }

  private renderTabs(block: TabsBlock, context: HtmlContext): string {
    const n = ++context.tabs;
    const buttons = block.panels.map((panel, i) => {
      const first = i === 0;
      return (
        `<button class="tab-btn${first ? ' active' : ''}" role="tab" aria-selected="${first}" ` +
        `aria-controls="surfdoc-tabs-${n}-panel-${i}" id="surfdoc-tabs-${n}-tab-${i}" tabindex="${first ? 0 : -1}">` +
        `${escapeHtml(panel.label)}</button>`
      );
    });
    const panels = block.panels.map((panel, i) => {
      const first = i === 0;
      return (
        `<div class="tab-panel${first ? ' active' : ''}" role="tabpanel" id="surfdoc-tabs-${n}-panel-${i}" ` +
        `aria-labelledby="surfdoc-tabs-${n}-tab-${i}" tabindex="0"${first ? '' : ' hidden'}>` +
        `${this.renderList(panel.children, context)}</div>`
      );
    });
    return `<div class="surfdoc-tabs"><nav role="tablist">${buttons.join('')}</nav>${panels.join('')}</div>`;
  }

  private renderTestimonial(block: TestimonialBlock): string {
    const label = block.author ? `Testimonial from ${block.author}` : 'Testimonial';
    const details: string[] = [];
    if (block.author) details.push(`<span class="author">${escapeHtml(block.author)}</span>`);
    const role = [block.role, block.company].filter((part): part is string => Boolean(part)).join(', ');
    if (role) details.push(`<span class="role">${escapeHtml(role)}</span>`);
    const caption = details.length > 0 ? `<figcaption>${details.join('')}</figcaption>` : '';
    return (
      `<figure class="surfdoc-testimonial" role="figure" aria-label="${escapeHtml(label)}">` +
      `<blockquote>${this.prose.toHtml(block.body)}</blockquote>${caption}</figure>`
    );
  }
}
