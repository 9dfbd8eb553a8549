/**
 * SurfDoc Parser
 *
 * Runs scan, build and validate over a whole document and returns an
 * immutable tree with its diagnostics. Malformed input never throws: the
 * tree is the best reading of the text and the diagnostics say what went
 * wrong.
 *
 * @since 2026-10-18
 */

import { createHash } from 'crypto';
import { ORIGIN } from '../base/SourceTypes.js';
import { sortDiagnostics } from '../base/Diagnostics.js';
import type { Diagnostic } from '../base/Diagnostics.js';
import type { SurfDocument } from '../model/types.js';
import { deepFreeze } from '../model/freeze.js';
import { BlockBuilder } from '../blocks/BlockBuilder.js';
import { normalizeLineEndings } from '../scanner/DirectiveScanner.js';
import { Validator } from '../validation/Validator.js';
import { extractFrontMatter } from '../markdown/FrontMatter.js';
import type { ParseOptions, ParseResult, SurfDocParserOptions } from './types.js';

export function contentHash(source: string): string {
  return createHash('sha256').update(source).digest('hex').slice(0, 16);
}

export class SurfDocParser {
  private readonly builder = new BlockBuilder();
  private readonly validator: Validator;

  constructor(options: SurfDocParserOptions = {}) {
    this.validator = new Validator(options.validator);
  }

  parse(text: string, options: ParseOptions = {}): ParseResult {
    const source = normalizeLineEndings(text);

    let body = source;
    let bodyStart = ORIGIN;
    let frontMatter: Record<string, string> | undefined;
    let frontMatterError: string | undefined;

    if (options.extractFrontMatter) {
      const extracted = extractFrontMatter(source);
      if (extracted.raw !== undefined) {
        body = extracted.body;
        bodyStart = extracted.bodyStart;
        frontMatter = { ...extracted.data };
        frontMatterError = extracted.error;
      }
    }
    if (options.frontMatter) {
      frontMatter = { ...frontMatter, ...options.frontMatter };
    }

    const { nodes, diagnostics: parseDiagnostics } = this.builder.build(body, bodyStart);
    const lexical = sortDiagnostics(parseDiagnostics);
    const diagnostics = options.validate === false
      ? lexical
      : sortDiagnostics([...lexical, ...this.validator.validate(nodes)]);

    const document: SurfDocument = deepFreeze({
      nodes,
      ...(frontMatter ? { frontMatter } : {}),
      parseDiagnostics: lexical,
      diagnostics,
      source,
      hash: contentHash(source),
    });

    const result: ParseResult = { document, diagnostics: document.diagnostics };
    if (frontMatterError !== undefined) result.frontMatterError = frontMatterError;
    return result;
  }

  /**
   * Semantic diagnostics only, sorted
   */
  validate(document: SurfDocument): Diagnostic[] {
    return this.validator.validate(document.nodes);
  }

  /**
   * Full diagnostic list for an unchanged tree: recorded lexical
   * diagnostics plus a fresh validation pass
   */
  revalidate(document: SurfDocument): Diagnostic[] {
    return sortDiagnostics([...document.parseDiagnostics, ...this.validator.validate(document.nodes)]);
  }
}

const defaultParser = new SurfDocParser();

/**
 * Parse SurfDoc text into a validated document
 */
export function parse(text: string, options?: ParseOptions): ParseResult {
  return defaultParser.parse(text, options);
}

export function validate(document: SurfDocument): Diagnostic[] {
  return defaultParser.validate(document);
}

export function revalidate(document: SurfDocument): Diagnostic[] {
  return defaultParser.revalidate(document);
}
