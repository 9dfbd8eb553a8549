/**
 * Inline Extensions
 *
 * Single-colon markers inside prose:
 *
 *   Revenue grew 40% :evidence[tier=1 source="Annual report"] and the
 *   migration is :status[value=shipped].
 *
 * A double colon (`::evidence[...]`) is never an inline marker. Brackets
 * that do not parse as an attribute list leave the text as it is.
 *
 * @since 2026-10-18
 */

import type { Token, Tokens, TokensList, TokenizerAndRendererExtension } from 'marked';
import { AttributeParser } from '../attributes/AttributeParser.js';
import { attrText } from '../model/attributes.js';
import { escapeHtml } from './escape.js';
import type { InlineExtension, InlineExtensionMatch } from './types.js';

const MARKER = /^:(evidence|status)\[([^\]\n]*)\]/;
const MARKER_START = /(?<!:):(?:evidence|status)\[/;

const attributeParser = new AttributeParser();

/**
 * Marker at the very start of `text`, or null
 */
export function matchInlineExtension(text: string): { raw: string; extension: InlineExtension } | null {
  const match = MARKER.exec(text);
  if (!match) return null;
  const [raw, name, inner] = match;

  const { attributes, diagnostics } = attributeParser.parse(inner);
  if (diagnostics.length > 0) return null;

  if (name === 'status') {
    return { raw, extension: { kind: 'status', value: attrText(attributes, 'value') ?? '' } };
  }

  const tier = attrText(attributes, 'tier');
  const source = attrText(attributes, 'source');
  return {
    raw,
    extension: {
      kind: 'evidence',
      text: inner.trim(),
      ...(tier !== undefined && /^\d+$/.test(tier) ? { tier: Number(tier) } : {}),
      ...(source !== undefined ? { source } : {}),
    },
  };
}

/**
 * Every inline marker in `text`, with character offsets
 */
export function scanInlineExtensions(text: string): InlineExtensionMatch[] {
  const found: InlineExtensionMatch[] = [];
  let pos = 0;
  while (pos < text.length) {
    const next = text.slice(pos).search(MARKER_START);
    if (next === -1) break;
    const start = pos + next;
    const match = start > 0 && text[start - 1] === ':' ? null : matchInlineExtension(text.slice(start));
    if (match) {
      found.push({ start, end: start + match.raw.length, extension: match.extension });
      pos = start + match.raw.length;
    } else {
      pos = start + 1;
    }
  }
  return found;
}

export function inlineExtensionHtml(extension: InlineExtension): string {
  if (extension.kind === 'status') {
    const value = escapeHtml(extension.value);
    return `<span class="surfdoc-status" data-status="${value}">${value}</span>`;
  }
  const tier = extension.tier !== undefined ? ` data-tier="${extension.tier}"` : '';
  return `<span class="surfdoc-evidence"${tier}>${escapeHtml(extension.source ?? extension.text)}</span>`;
}

/**
 * `marked` extension that tokenizes the markers and renders them as spans
 */
export const inlineExtensionTokens: TokenizerAndRendererExtension = {
  name: 'surfdocInline',
  level: 'inline',
  start(src: string) {
    const index = src.search(MARKER_START);
    return index === -1 ? undefined : index;
  },
  tokenizer(src: string, tokens: Token[] | TokensList) {
    const previous = tokens[tokens.length - 1];
    if (previous !== undefined && previous.raw.endsWith(':')) return undefined;
    const match = matchInlineExtension(src);
    return match ? { type: 'surfdocInline', raw: match.raw } : undefined;
  },
  renderer(token: Tokens.Generic) {
    const match = matchInlineExtension(token.raw);
    return match ? inlineExtensionHtml(match.extension) : false;
  },
};
