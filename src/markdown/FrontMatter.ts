/**
 * Front matter extraction
 *
 * Splits a leading `---` YAML block from a document and flattens its
 * values to strings. The body keeps its original start position so that
 * scanning it still reports document line numbers.
 *
 * @since 2026-10-18
 */

import { parse as parseYaml } from 'yaml';
import { ORIGIN, lineEnd, splitLines } from '../base/SourceTypes.js';
import { normalizeLineEndings } from '../scanner/DirectiveScanner.js';
import type { FrontMatterResult } from './types.js';

function flattenValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(flattenValue).join(', ');
  return JSON.stringify(value);
}

/**
 * Flatten a parsed YAML mapping; any other root yields an empty map
 */
export function flattenFrontMatter(parsed: unknown): Record<string, string> {
  const data: Record<string, string> = {};
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return data;
  for (const [key, value] of Object.entries(parsed)) {
    data[key] = flattenValue(value);
  }
  return data;
}

export function extractFrontMatter(text: string): FrontMatterResult {
  const source = normalizeLineEndings(text);
  const lines = splitLines(source);

  if (lines.length === 0 || lines[0].text.trim() !== '---') {
    return { data: {}, body: source, bodyStart: ORIGIN };
  }

  const close = lines.findIndex((line, index) => index > 0 && line.text.trim() === '---');
  if (close === -1) {
    return { data: {}, body: source, bodyStart: ORIGIN };
  }

  const raw = lines.slice(1, close).map(line => line.text).join('\n');
  const bodyLines = lines.slice(close + 1);
  const body = bodyLines.map(line => line.text).join('\n');
  const bodyStart = bodyLines.length > 0 ? bodyLines[0].start : lineEnd(lines[close]);

  try {
    return { data: flattenFrontMatter(parseYaml(raw)), raw, body, bodyStart };
  } catch (err) {
    return {
      data: {},
      raw,
      body,
      bodyStart,
      error: err instanceof Error ? err.message : 'Failed to parse front matter',
    };
  }
}
