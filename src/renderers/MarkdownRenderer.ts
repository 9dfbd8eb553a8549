/**
 * Markdown Renderer
 *
 * Degrades a document to plain CommonMark: typed blocks become their
 * closest markdown equivalent and no `::` fences remain, except for
 * unknown directives, which are written back exactly as they were read.
 *
 * @since 2026-10-18
 */

import { BaseDocumentRenderer } from '../base/Renderer.js';
import type { SitePageContext } from '../base/Renderer.js';
import type { RenderConfig } from '../base/RenderConfig.js';
import type { Block, CalloutType, DocumentNode } from '../model/types.js';
import { unparsedBody } from '../blocks/content.js';

const CALLOUT_LABELS: Readonly<Record<CalloutType, string>> = {
  info: 'Info',
  warning: 'Warning',
  danger: 'Danger',
  tip: 'Tip',
  note: 'Note',
  success: 'Success',
};

const TREND_ARROWS = { up: '↑', down: '↓', flat: '→' } as const;

function blockquote(text: string): string[] {
  return text.length === 0 ? [] : text.split('\n').map(line => (line.length > 0 ? `> ${line}` : '>'));
}

function pipeCell(cell: string): string {
  return cell.replace(/\|/g, '\\|');
}

export function pipeTable(headers: readonly string[], rows: readonly string[][]): string {
  if (headers.length === 0) return '';
  const lines = [
    `| ${headers.map(pipeCell).join(' | ')} |`,
    `| ${headers.map(() => '---').join(' | ')} |`,
    ...rows.map(row => `| ${row.map(pipeCell).join(' | ')} |`),
  ];
  return lines.join('\n');
}

/**
 * Backtick fence one longer than any run inside the body
 */
function codeFence(body: string): string {
  const longest = Math.max(2, ...(body.match(/`{3,}/g) ?? []).map(run => run.length));
  return '`'.repeat(longest + 1);
}

export class MarkdownRenderer extends BaseDocumentRenderer {
  readonly format = 'markdown';
  readonly extension = '.md';

  renderNodes(nodes: readonly DocumentNode[], config: RenderConfig): string {
    return nodes
      .map(node => (node.kind === 'prose' ? node.text.replace(/^\s*\n|\s+$/g, '') : this.renderBlock(node, config)))
      .filter(part => part.length > 0)
      .join('\n\n');
  }

  renderSitePage(context: SitePageContext, config: RenderConfig): string {
    const { page, entry, nav, siteName } = context;
    const links = nav.map(item =>
      item.id === entry.id ? `- **[${item.title}](${item.route})**` : `- [${item.title}](${item.route})`
    );
    const parts = [`# ${entry.title}`, `*${siteName}*`, links.join('\n'), '---'];
    const body = this.renderNodes(page.children, config);
    if (body) parts.push(body);
    return parts.join('\n\n');
  }

  private renderBlock(block: Block, config: RenderConfig): string {
    const unparsed = unparsedBody(block);
    if (unparsed !== undefined) {
      if (block.kind !== 'data' && block.kind !== 'pricing-table') return unparsed;
      const fence = codeFence(unparsed);
      const lang = block.kind === 'data' && block.format !== 'table' ? block.format : '';
      return `${fence}${lang}\n${unparsed}\n${fence}`;
    }

    switch (block.kind) {
      case 'callout': {
        const label = `**${CALLOUT_LABELS[block.calloutType]}**${block.title ? `: ${block.title}` : ''}`;
        return [`> ${label}`, ...blockquote(block.body)].join('\n');
      }
      case 'data':
        return pipeTable(block.headers, block.rows);
      case 'code': {
        const fence = codeFence(block.body);
        const meta: string[] = [];
        if (block.file) meta.push(`file="${block.file}"`);
        if (block.highlight.length > 0) meta.push(`highlight="${block.highlight.join(',')}"`);
        const info = meta.length > 0 ? [block.lang ?? 'text', ...meta].join(' ') : block.lang ?? '';
        return `${fence}${info}\n${block.body}\n${fence}`;
      }
      case 'tasks':
        return block.items
          .map(item => `- [${item.done ? 'x' : ' '}] ${item.text}${item.assignee ? ` @${item.assignee}` : ''}`)
          .join('\n');
      case 'decision': {
        const header = `> **Decision** (${block.status})${block.date ? ` (${block.date})` : ''}`;
        const lines = [header, ...blockquote(block.body)];
        const details: string[] = [];
        if (block.deciders.length > 0) details.push(`**Deciders**: ${block.deciders.join(', ')}`);
        if (block.options.length > 0) {
          const options = block.options.map(option => (option === block.outcome ? `${option} (chosen)` : option));
          details.push(`**Options**: ${options.join(', ')}`);
        }
        if (block.outcome) details.push(`**Outcome**: ${block.outcome}`);
        for (const detail of details) lines.push('>', `> ${detail}`);
        return lines.join('\n');
      }
      case 'metric': {
        const unit = block.unit ? ` ${block.unit}` : '';
        const trend = block.trend ? ` ${TREND_ARROWS[block.trend]}` : '';
        return `**${block.label}**: ${block.displayValue}${unit}${trend}`;
      }
      case 'summary':
        return block.body
          .split('\n')
          .filter(line => line.trim().length > 0)
          .map(line => `> *${line.trim()}*`)
          .join('\n');
      case 'figure': {
        const lines = [`![${block.alt ?? ''}](${block.src})`];
        if (block.caption) lines.push(`*${block.caption}*`);
        if (block.width) lines.push(`<!-- width: ${block.width.replace(/--/g, '- -')} -->`);
        return lines.join('\n');
      }
      case 'tabs':
        return block.panels
          .map(panel => {
            const body = this.renderNodes(panel.children, config);
            return body ? `### ${panel.label}\n\n${body}` : `### ${panel.label}`;
          })
          .join('\n\n');
      case 'columns':
        return block.columns.map(column => this.renderNodes(column.children, config)).join('\n\n---\n\n');
      case 'quote': {
        const lines = blockquote(block.body);
        if (block.attribution) {
          lines.push('>', `> — ${block.attribution}${block.cite ? `, *${block.cite}*` : ''}`);
        }
        return lines.join('\n');
      }
      case 'cta':
        return `[${block.label}](${block.href})`;
      case 'hero-image':
        return `![${block.alt ?? 'Hero image'}](${block.src})`;
      case 'testimonial': {
        const lines = blockquote(block.body);
        const details = [block.author, block.role, block.company].filter((part): part is string => Boolean(part));
        if (details.length > 0) lines.push('>', `> — ${details.join(', ')}`);
        return lines.join('\n');
      }
      case 'style': {
        const properties = block.properties.map(p => `${p.key}: ${p.value}`).join('; ');
        return `<!-- style: ${properties.replace(/--/g, '- -')} -->`;
      }
      case 'faq':
        return block.items.map(item => `### ${item.question}\n\n${item.answer}`).join('\n\n');
      case 'pricing-table':
        return pipeTable(block.headers, block.rows);
      case 'site': {
        const lines = ['**Site Configuration**'];
        if (block.name !== undefined) lines.push(`- name: ${block.name}`);
        if (block.domain !== undefined) lines.push(`- domain: ${block.domain}`);
        for (const property of block.properties) lines.push(`- ${property.key}: ${property.value}`);
        const children = this.renderNodes(block.children, config);
        return children ? `${lines.join('\n')}\n\n${children}` : lines.join('\n');
      }
      case 'page': {
        const heading = block.title ?? block.route;
        const children = this.renderNodes(block.children, config);
        if (heading === undefined) return children;
        return children ? `## ${heading}\n\n${children}` : `## ${heading}`;
      }
      case 'unknown':
        return block.rawText;
    }
  }
}
