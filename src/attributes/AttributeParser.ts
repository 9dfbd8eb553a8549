/**
 * Attribute Parser
 *
 * Parses the bracketed attribute list of a directive header:
 *
 *   [type=warning, title="Heads up", sortable, tags=["a", "b"], width=0.5]
 *
 * Entries are separated by commas and/or whitespace. A bare key is a
 * boolean flag. Malformed entries are reported and skipped; the first
 * occurrence of a duplicated key wins.
 *
 * @since 2026-10-18
 */

import { ORIGIN, shift } from '../base/SourceTypes.js';
import type { SourcePosition } from '../base/SourceTypes.js';
import { createDiagnostic } from '../base/Diagnostics.js';
import type { Diagnostic } from '../base/Diagnostics.js';
import type { AttributeValue } from '../model/types.js';
import type { AttributeParseResult } from './types.js';

const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d+)?|\.\d+)$/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][\w-]*$/;
const KEY_START = /[A-Za-z_]/;
const KEY_CHAR = /[\w-]/;

/**
 * Classify an unquoted token
 */
export function coerceBareValue(token: string): AttributeValue {
  if (token === 'true') return { kind: 'boolean', value: true };
  if (token === 'false') return { kind: 'boolean', value: false };
  if (NUMBER_PATTERN.test(token)) return { kind: 'number', value: Number(token) };
  if (IDENTIFIER_PATTERN.test(token)) return { kind: 'symbol', value: token };
  return { kind: 'string', value: token };
}

export class AttributeParser {
  private text = '';
  private pos = 0;
  private end = 0;
  private origin: SourcePosition = ORIGIN;
  private diagnostics: Diagnostic[] = [];

  /**
   * Parse an attribute list
   *
   * @param raw - Header text after the tag, with or without brackets
   * @param origin - Position of the first character of `raw`
   */
  parse(raw: string, origin: SourcePosition = ORIGIN): AttributeParseResult {
    this.text = raw;
    this.origin = origin;
    this.diagnostics = [];
    this.pos = 0;
    this.end = raw.length;

    const attributes = new Map<string, AttributeValue>();

    this.skipWhitespace();
    if (this.peek() === '[') {
      this.pos++;
      const trimmedEnd = raw.trimEnd().length;
      this.end = raw[trimmedEnd - 1] === ']' && trimmedEnd - 1 >= this.pos ? trimmedEnd - 1 : trimmedEnd;
    }

    while (this.pos < this.end) {
      this.skipSeparators();
      if (this.pos >= this.end) break;

      const keyStart = this.pos;
      const first = this.text[this.pos];
      if (!KEY_START.test(first)) {
        this.report(keyStart, keyStart + 1, `Unexpected character '${first}' in attribute list`);
        this.skipToSeparator();
        continue;
      }

      while (this.pos < this.end && KEY_CHAR.test(this.text[this.pos])) {
        this.pos++;
      }
      const key = this.text.slice(keyStart, this.pos);

      const afterKey = this.pos;
      this.skipWhitespace();
      if (this.peek() !== '=') {
        this.pos = afterKey;
        this.store(attributes, key, { kind: 'boolean', value: true }, keyStart);
        continue;
      }
      this.pos++;
      this.skipWhitespace();

      const next = this.peek();
      if (next === undefined || next === ',') {
        this.report(keyStart, this.pos, `Missing value after '=' for key '${key}'`);
        continue;
      }

      let value: AttributeValue;
      if (next === '"') {
        value = { kind: 'string', value: this.readQuoted(key, keyStart) };
      } else if (next === '[') {
        value = { kind: 'list', value: this.readList(key, keyStart) };
      } else {
        const tokenStart = this.pos;
        this.skipToSeparator();
        value = coerceBareValue(this.text.slice(tokenStart, this.pos));
      }
      this.store(attributes, key, value, keyStart);
    }

    return { attributes, diagnostics: this.diagnostics };
  }

  private store(
    attributes: Map<string, AttributeValue>,
    key: string,
    value: AttributeValue,
    keyStart: number
  ): void {
    if (attributes.has(key)) {
      this.report(
        keyStart,
        this.pos,
        `Duplicate attribute '${key}'; the first value is kept`,
        'duplicate-attribute'
      );
      return;
    }
    attributes.set(key, value);
  }

  private readQuoted(key: string, keyStart: number): string {
    this.pos++; // opening quote
    let value = '';
    while (this.pos < this.end && this.text[this.pos] !== '"') {
      const ch = this.text[this.pos];
      const next = this.text[this.pos + 1];
      if (ch === '\\' && (next === '"' || next === '\\') && this.pos + 1 < this.end) {
        value += next;
        this.pos += 2;
      } else {
        value += ch;
        this.pos++;
      }
    }
    if (this.peek() === '"') {
      this.pos++;
    } else {
      this.report(keyStart, this.pos, `Unterminated quoted value for key '${key}'`);
    }
    return value;
  }

  private readList(key: string, keyStart: number): string[] {
    this.pos++; // opening bracket
    const items: string[] = [];
    while (this.pos < this.end) {
      this.skipSeparators();
      const ch = this.peek();
      if (ch === undefined) break;
      if (ch === ']') {
        this.pos++;
        return items;
      }
      if (ch === '"') {
        items.push(this.readQuoted(key, keyStart));
      } else {
        const itemStart = this.pos;
        while (this.pos < this.end && !/[\s,\]]/.test(this.text[this.pos])) {
          this.pos++;
        }
        items.push(this.text.slice(itemStart, this.pos));
      }
    }
    this.report(keyStart, this.pos, `Unterminated list value for key '${key}'`);
    return items;
  }

  private peek(): string | undefined {
    return this.pos < this.end ? this.text[this.pos] : undefined;
  }

  private skipWhitespace(): void {
    while (this.pos < this.end && /\s/.test(this.text[this.pos])) {
      this.pos++;
    }
  }

  private skipSeparators(): void {
    while (this.pos < this.end && /[\s,]/.test(this.text[this.pos])) {
      this.pos++;
    }
  }

  private skipToSeparator(): void {
    while (this.pos < this.end && !/[\s,]/.test(this.text[this.pos])) {
      this.pos++;
    }
  }

  private report(
    from: number,
    to: number,
    message: string,
    code: 'malformed-attributes' | 'duplicate-attribute' = 'malformed-attributes'
  ): void {
    this.diagnostics.push(
      createDiagnostic(code, message, {
        start: shift(this.origin, from),
        end: shift(this.origin, Math.max(to, from)),
      })
    );
  }
}

/**
 * Convenience wrapper around a fresh parser
 */
export function parseAttributes(raw: string, origin: SourcePosition = ORIGIN): AttributeParseResult {
  return new AttributeParser().parse(raw, origin);
}
