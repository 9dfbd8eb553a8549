/**
 * Prose Engine
 *
 * Thin wrapper around a private `marked` instance. Prose between
 * directives and the bodies of leaf blocks are CommonMark/GFM plus the
 * inline `:evidence[...]`/`:status[...]` markers; this is the only place
 * that knows which markdown library renders them. Script URLs in links
 * and images become `#`.
 *
 * @since 2026-10-18
 */

import { Marked } from 'marked';
import type { Token } from 'marked';
import { escapeHtml, isScriptUrl } from './escape.js';
import { inlineExtensionTokens } from './InlineExtensions.js';
import type { ProseEngineOptions } from './types.js';

export class ProseEngine {
  private readonly marked: Marked;

  constructor(options: ProseEngineOptions = {}) {
    this.marked = new Marked({ gfm: options.gfm ?? true, async: false });
    this.marked.use({
      extensions: [inlineExtensionTokens],
      renderer: {
        link(href, title, text) {
          if (!isScriptUrl(href)) return false;
          return `<a href="#"${title ? ` title="${title}"` : ''}>${text}</a>`;
        },
        image(href, _title, text) {
          if (!isScriptUrl(href)) return false;
          return `<img src="#" alt="${text}">`;
        },
      },
    });
    if (options.escapeHtml ?? true) {
      this.marked.use({
        renderer: {
          html(html: string): string {
            return escapeHtml(html);
          },
        },
      });
    }
  }

  /**
   * Block-level tokens for a markdown fragment
   */
  tokens(markdown: string): Token[] {
    return this.marked.lexer(markdown);
  }

  /**
   * HTML for a markdown fragment, without the trailing newline
   */
  toHtml(markdown: string): string {
    if (markdown.trim().length === 0) return '';
    return this.marked.parser(this.marked.lexer(markdown)).trimEnd();
  }
}

/** Shared default engine */
export const defaultProseEngine = new ProseEngine();
