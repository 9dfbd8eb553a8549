/**
 * Body parsers for blocks with structured text content
 */

import type { Block, StyleProperty, TaskItem } from '../model/types.js';

export interface TableContent {
  headers: string[];
  rows: string[][];
}

function emptyTable(): TableContent {
  return { headers: [], rows: [] };
}

/**
 * `|---|:--:|` style separator row
 */
export function isTableSeparator(line: string): boolean {
  const stripped = line.trim().replace(/^\|/, '').replace(/\|$/, '').trim();
  if (stripped.length === 0) return false;
  return stripped.split('|').every(cell => /^[\s:-]*$/.test(cell) && cell.includes('-'));
}

export function splitPipeRow(line: string): string[] {
  let inner = line.trim();
  if (inner.startsWith('|')) inner = inner.slice(1);
  if (inner.endsWith('|')) inner = inner.slice(0, -1);
  return inner.split('|').map(cell => cell.trim());
}

/**
 * Pipe table: first non-blank row is the header, separator rows are skipped
 */
export function parsePipeTable(body: string): TableContent {
  const table = emptyTable();
  let headerDone = false;
  for (const line of body.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.length === 0 || isTableSeparator(trimmed)) continue;
    const cells = splitPipeRow(trimmed);
    if (headerDone) {
      table.rows.push(cells);
    } else {
      table.headers = cells;
      headerDone = true;
    }
  }
  return table;
}

/**
 * Split one CSV record. Double-quoted fields may contain commas and `""`.
 */
export function splitCsvRecord(line: string): string[] {
  const cells: string[] = [];
  let current = '';
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"' && current.trim().length === 0) {
      quoted = true;
      current = '';
    } else if (ch === ',') {
      cells.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }
  cells.push(quoted ? current : current.trim());
  return cells;
}

export function parseCsv(body: string): TableContent {
  const lines = body.split('\n').filter(line => line.trim().length > 0);
  if (lines.length === 0) return emptyTable();
  const [header, ...rest] = lines;
  return {
    headers: splitCsvRecord(header.trim()),
    rows: rest.map(line => splitCsvRecord(line.trim())),
  };
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON array of objects. Headers are the keys in order of first appearance.
 * Anything else yields an empty table.
 */
export function parseJsonTable(body: string): TableContent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return emptyTable();
  }
  if (!Array.isArray(parsed)) return emptyTable();

  const records = parsed.filter(isRecord);
  const headers: string[] = [];
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!headers.includes(key)) headers.push(key);
    }
  }
  return {
    headers,
    rows: records.map(record => headers.map(key => cellText(record[key]))),
  };
}

const TASK_LINE = /^[-*] \[([ xX])\] (.*)$/;

/**
 * `- [ ] text` and `- [x] text @owner` lines; other lines are ignored
 */
export function parseTaskItems(body: string): TaskItem[] {
  const items: TaskItem[] = [];
  for (const line of body.split('\n')) {
    const match = TASK_LINE.exec(line.trim());
    if (!match) continue;
    const { text, assignee } = extractAssignee(match[2]);
    items.push(assignee === undefined
      ? { done: match[1] !== ' ', text }
      : { done: match[1] !== ' ', text, assignee });
  }
  return items;
}

export function extractAssignee(text: string): { text: string; assignee?: string } {
  const trimmed = text.trimEnd();
  const at = trimmed.lastIndexOf(' @');
  if (at !== -1) {
    const candidate = trimmed.slice(at + 2);
    if (candidate.length > 0 && !/\s/.test(candidate)) {
      return { text: trimmed.slice(0, at).trimEnd(), assignee: candidate };
    }
  }
  return { text: trimmed };
}

const PROPERTY_LINE = /^([A-Za-z][\w.-]*)\s*:\s*(\S.*)$/;

/**
 * `key: value` line, or null
 */
export function parsePropertyLine(line: string): StyleProperty | null {
  const match = PROPERTY_LINE.exec(line.trim());
  if (!match) return null;
  return { key: match[1], value: match[2].trim() };
}

export function parseProperties(body: string): StyleProperty[] {
  const properties: StyleProperty[] = [];
  for (const line of body.split('\n')) {
    const property = parsePropertyLine(line);
    if (property) properties.push(property);
  }
  return properties;
}

/**
 * Body of a tasks, data or pricing block whose content yielded no items
 * or rows. Undefined when the block parsed or its body is blank.
 */
export function unparsedBody(block: Block): string | undefined {
  let empty: boolean;
  switch (block.kind) {
    case 'tasks':
      empty = block.items.length === 0;
      break;
    case 'data':
    case 'pricing-table':
      empty = block.headers.length === 0;
      break;
    default:
      return undefined;
  }
  const body = block.rawBody.replace(/^\s*\n|\s+$/g, '');
  return empty && body.length > 0 ? body : undefined;
}
