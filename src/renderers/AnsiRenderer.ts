/**
 * ANSI Renderer
 *
 * Terminal output styled with picocolors. Tables are drawn with
 * box-drawing characters; prose is rendered from marked's token stream.
 * With `color: false` the output contains no escape sequences at all.
 *
 * @since 2026-10-18
 */

import pc from 'picocolors';
import type { Token, Tokens } from 'marked';
import { BaseDocumentRenderer } from '../base/Renderer.js';
import type { SitePageContext } from '../base/Renderer.js';
import type { RenderConfig } from '../base/RenderConfig.js';
import type { Block, CalloutType, DecisionStatus, DocumentNode } from '../model/types.js';
import { ProseEngine, defaultProseEngine } from '../markdown/ProseEngine.js';
import { unparsedBody } from '../blocks/content.js';
import { matchInlineExtension } from '../markdown/InlineExtensions.js';

export type Colors = ReturnType<typeof pc.createColors>;

type Paint = (text: string) => string;

type Hue = 'blue' | 'yellow' | 'red' | 'green' | 'cyan';

const CALLOUT_STYLES: Readonly<Record<CalloutType, { label: string; color: Hue }>> = {
  info: { label: 'Info', color: 'blue' },
  warning: { label: 'Warning', color: 'yellow' },
  danger: { label: 'Danger', color: 'red' },
  tip: { label: 'Tip', color: 'green' },
  note: { label: 'Note', color: 'cyan' },
  success: { label: 'Success', color: 'green' },
};

const ENTITIES: Readonly<Record<string, string>> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
};

function unescapeEntities(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|#39);/g, entity => ENTITIES[entity] ?? entity);
}

function prefixLines(text: string, prefix: string, style: Paint = line => line): string[] {
  return text.length === 0 ? [] : text.split('\n').map(line => (line.length > 0 ? `${prefix} ${style(line)}` : prefix));
}

function isListToken(token: Token): token is Tokens.List {
  return token.type === 'list';
}

/**
 * Box-drawn table; column widths follow the longest cell
 */
export function boxTable(headers: readonly string[], rows: readonly string[][], c: Colors): string {
  if (headers.length === 0) return '';
  const widths = headers.map(h => h.length);
  for (const row of rows) {
    row.forEach((cell, i) => {
      if (i < widths.length) widths[i] = Math.max(widths[i], cell.length);
    });
  }

  const rule = (left: string, middle: string, right: string) =>
    left + widths.map(w => '─'.repeat(w + 2)).join(middle) + right;
  const line = (cells: readonly string[], style: Paint) =>
    '│' + widths.map((w, i) => ` ${style((cells[i] ?? '').padEnd(w))} `).join('│') + '│';

  return [
    rule('┌', '┬', '┐'),
    line(headers, c.bold),
    rule('├', '┼', '┤'),
    ...rows.map(row => line(row, text => text)),
    rule('└', '┴', '┘'),
  ].join('\n');
}

function decisionBadge(status: DecisionStatus, c: Colors): string {
  const badge = `[${status.toUpperCase()}]`;
  switch (status) {
    case 'accepted':
      return c.green(badge);
    case 'rejected':
      return c.red(badge);
    case 'proposed':
      return c.yellow(badge);
    case 'superseded':
      return c.dim(badge);
  }
}

export class AnsiRenderer extends BaseDocumentRenderer {
  readonly format = 'ansi';
  readonly extension = '.txt';

  constructor(private readonly prose: ProseEngine = defaultProseEngine) {
    super();
  }

  renderNodes(nodes: readonly DocumentNode[], config: RenderConfig): string {
    return this.renderNodeList(nodes, pc.createColors(config.color));
  }

  renderSitePage(context: SitePageContext, config: RenderConfig): string {
    const c = pc.createColors(config.color);
    const { page, entry, nav, siteName } = context;
    const links = nav.map(item => (item.id === entry.id ? c.bold(c.underline(item.title)) : c.dim(item.title)));
    const header = [c.bold(c.cyan(siteName)), links.join(c.dim(' | ')), c.dim('─'.repeat(40))].join('\n');
    const body = this.renderNodeList(page.children, c);
    return body ? `${header}\n\n${body}` : header;
  }

  private renderNodeList(nodes: readonly DocumentNode[], c: Colors): string {
    return nodes
      .map(node => (node.kind === 'prose' ? this.renderProse(node.text, c) : this.renderBlock(node, c)))
      .filter(part => part.length > 0)
      .join('\n\n');
  }

  /**
   * Markdown to styled text, one token at a time
   */
  renderProse(markdown: string, c: Colors): string {
    return this.renderTokens(this.prose.tokens(markdown), c);
  }

  private renderTokens(tokens: readonly Token[], c: Colors): string {
    return tokens
      .map(token => this.renderToken(token, c))
      .filter(part => part.length > 0)
      .join('\n\n');
  }

  private renderToken(token: Token, c: Colors): string {
    switch (token.type) {
      case 'space':
        return '';
      case 'heading': {
        const text = this.renderInline(token.tokens, c);
        return token.depth === 1 ? c.bold(c.underline(text)) : c.bold(text);
      }
      case 'paragraph':
        return this.renderInline(token.tokens, c);
      case 'text':
        return 'tokens' in token && token.tokens ? this.renderInline(token.tokens, c) : unescapeEntities(token.text);
      case 'code': {
        const lines = [c.dim(`───${token.lang ? ` ${token.lang}` : ''}`), ...prefixLines(token.text, ' ')];
        lines.push(c.dim('───'));
        return lines.join('\n');
      }
      case 'blockquote':
        return prefixLines(this.renderTokens(token.tokens ?? [], c), c.dim('│')).join('\n');
      case 'list':
        return isListToken(token) ? this.renderListToken(token, c) : token.raw.trim();
      case 'hr':
        return c.dim('─'.repeat(40));
      case 'table':
        return boxTable(
          token.header.map((cell: Tokens.TableCell) => unescapeEntities(cell.text)),
          token.rows.map((row: Tokens.TableCell[]) => row.map(cell => unescapeEntities(cell.text))),
          c
        );
      case 'html':
        return token.text.trim();
      default:
        return token.raw.trim();
    }
  }

  private renderListToken(list: Tokens.List, c: Colors): string {
    const start = typeof list.start === 'number' ? list.start : 1;
    return list.items
      .map((item, i) => {
        const bullet = list.ordered ? `${start + i}.` : '•';
        const check = item.task ? (item.checked ? `${c.green('✓')} ` : '☐ ') : '';
        const body = this.renderTokens(item.tokens, c).replace(/\n/g, '\n  ');
        return `${bullet} ${check}${body}`;
      })
      .join('\n');
  }

  private renderInline(tokens: readonly Token[] | undefined, c: Colors): string {
    if (!tokens) return '';
    return tokens
      .map(token => {
        switch (token.type) {
          case 'strong':
            return c.bold(this.renderInline(token.tokens, c));
          case 'em':
            return c.italic(this.renderInline(token.tokens, c));
          case 'del':
            return c.strikethrough(this.renderInline(token.tokens, c));
          case 'codespan':
            return c.cyan(unescapeEntities(token.text));
          case 'br':
            return '\n';
          case 'link': {
            const label = this.renderInline(token.tokens, c);
            return token.text === token.href ? c.underline(label) : `${c.underline(label)} ${c.dim(`(${token.href})`)}`;
          }
          case 'image':
            return c.dim(`[image: ${token.text}] (${token.href})`);
          case 'surfdocInline': {
            const match = matchInlineExtension(token.raw);
            if (!match) return token.raw;
            const extension = match.extension;
            if (extension.kind === 'status') return c.bold(`[${extension.value}]`);
            const tier = extension.tier !== undefined ? `, tier ${extension.tier}` : '';
            return c.dim(`[${extension.source ?? extension.text}${tier}]`);
          }
          case 'text':
          case 'escape':
            return 'tokens' in token && token.tokens ? this.renderInline(token.tokens, c) : unescapeEntities(token.text);
          default:
            return unescapeEntities(token.raw);
        }
      })
      .join('');
  }

  private renderBlock(block: Block, c: Colors): string {
    const unparsed = unparsedBody(block);
    if (unparsed !== undefined) return unparsed;

    switch (block.kind) {
      case 'callout': {
        const style = CALLOUT_STYLES[block.calloutType];
        const border = c[style.color]('│');
        const heading = `${border} ${c.bold(style.label)}${block.title ? `: ${block.title}` : ''}`;
        return [heading, ...prefixLines(this.renderProse(block.body, c), border)].join('\n');
      }
      case 'data':
        return boxTable(block.headers, block.rows, c);
      case 'code': {
        const border = c.dim('───');
        const header = block.file ? `${border} ${c.dim(block.file)}` : `${border}${block.lang ? ` ${c.dim(block.lang)}` : ''}`;
        return [header, ...block.body.split('\n').map(line => `  ${line}`), border].join('\n');
      }
      case 'tasks':
        return block.items
          .map(item => {
            const assignee = item.assignee ? ` ${c.dim(`@${item.assignee}`)}` : '';
            return item.done
              ? `${c.green('✓')} ${c.strikethrough(c.green(item.text))}${assignee}`
              : `☐ ${item.text}${assignee}`;
          })
          .join('\n');
      case 'decision': {
        const date = block.date ? ` (${block.date})` : '';
        const lines = [`${decisionBadge(block.status, c)} ${c.bold('Decision')}${date}`];
        if (block.deciders.length > 0) lines.push(`${c.bold('Deciders:')} ${block.deciders.join(', ')}`);
        if (block.options.length > 0) {
          const options = block.options.map(option => (option === block.outcome ? c.green(`${option} ✓`) : option));
          lines.push(`${c.bold('Options:')} ${options.join(', ')}`);
        }
        if (block.outcome) lines.push(`${c.bold('Outcome:')} ${block.outcome}`);
        const body = this.renderProse(block.body, c);
        if (body) lines.push(body);
        return lines.join('\n');
      }
      case 'metric': {
        const unit = block.unit ? ` ${block.unit}` : '';
        let trend = '';
        if (block.trend === 'up') trend = ` ${c.green('↑')}`;
        if (block.trend === 'down') trend = ` ${c.red('↓')}`;
        if (block.trend === 'flat') trend = ` ${c.dim('→')}`;
        return `${c.bold(block.label)}: ${c.bold(block.displayValue)}${unit}${trend}`;
      }
      case 'summary':
        return prefixLines(this.renderProse(block.body, c), c.cyan('│'), c.italic).join('\n');
      case 'figure':
        return c.dim(`[Figure: ${block.caption ?? block.alt ?? 'Image'}] (${block.src})`);
      case 'tabs':
        return block.panels
          .map((panel, i) => {
            const label = c.bold(`[Tab ${i + 1}] ${panel.label}`);
            const body = this.renderNodeList(panel.children, c);
            return body ? `${label}\n${body}` : label;
          })
          .join('\n\n');
      case 'columns':
        return block.columns
          .map((column, i) => {
            const label = c.dim(`[Col ${i + 1}]`);
            const body = this.renderNodeList(column.children, c);
            return body ? `${label}\n${body}` : label;
          })
          .join('\n\n');
      case 'quote': {
        const border = c.dim('│');
        const lines = prefixLines(this.renderProse(block.body, c), border, c.italic);
        if (block.attribution) {
          lines.push(`${border} ${c.dim(`— ${block.attribution}${block.cite ? `, ${block.cite}` : ''}`)}`);
        }
        return lines.join('\n');
      }
      case 'cta': {
        const badge = block.primary ? c.bold(c.blue('[CTA]')) : c.dim('[CTA]');
        return `${badge} ${c.bold(block.label)} (${block.href})`;
      }
      case 'hero-image':
        return c.dim(`[Hero: ${block.alt ?? 'Hero image'}] (${block.src})`);
      case 'testimonial': {
        const border = c.dim('│');
        const lines = prefixLines(this.renderProse(block.body, c), border, c.italic);
        const details = [block.author, block.role, block.company].filter((part): part is string => Boolean(part));
        if (details.length > 0) lines.push(`${border} ${c.dim(`— ${details.join(', ')}`)}`);
        return lines.join('\n');
      }
      case 'style':
        if (block.properties.length === 0) return c.dim('[Style: empty]');
        return [c.dim('[Style]'), ...block.properties.map(p => `  ${c.bold(p.key)}: ${p.value}`)].join('\n');
      case 'faq':
        return block.items
          .map((item, i) => `${c.bold(`Q${i + 1}: ${item.question}`)}\n  ${item.answer.replace(/\n/g, '\n  ')}`)
          .join('\n\n');
      case 'pricing-table': {
        const table = boxTable(block.headers, block.rows, c);
        return table ? `${c.bold(c.cyan('[Pricing]'))}\n${table}` : '';
      }
      case 'site': {
        const lines = [c.bold(c.cyan('[Site Config]'))];
        if (block.name !== undefined) lines.push(`  ${c.bold('name')}: ${block.name}`);
        if (block.domain !== undefined) lines.push(`  ${c.bold('domain')}: ${block.domain}`);
        for (const property of block.properties) lines.push(`  ${c.bold(property.key)}: ${property.value}`);
        const children = this.renderNodeList(block.children, c);
        return children ? `${lines.join('\n')}\n\n${children}` : lines.join('\n');
      }
      case 'page': {
        const layout = block.layout ? ` layout=${block.layout}` : '';
        const label = c.bold(c.cyan(`[Page ${block.route ?? block.title ?? ''}${layout}]`));
        const children = this.renderNodeList(block.children, c);
        return children ? `${label}\n${children}` : label;
      }
      case 'unknown': {
        const label = c.dim(`[${block.tag}]`);
        return block.rawBody.length > 0 ? `${label}\n${block.rawBody}` : label;
      }
    }
  }
}
