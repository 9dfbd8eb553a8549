/**
 * Types for the parser facade
 */

import type { Diagnostic } from '../base/Diagnostics.js';
import type { SurfDocument } from '../model/types.js';
import type { ValidatorOptions } from '../validation/Validator.js';

export interface ParseOptions {
  /** Front matter supplied by the caller; wins over extracted keys */
  frontMatter?: Readonly<Record<string, string>>;
  /** Split and read a leading `---` YAML block (default: false) */
  extractFrontMatter?: boolean;
  /** Run the validator (default: true) */
  validate?: boolean;
}

export interface ParseResult {
  document: SurfDocument;
  /** Same list as `document.diagnostics` */
  diagnostics: readonly Diagnostic[];
  /** YAML error when `extractFrontMatter` found an unreadable block */
  frontMatterError?: string;
}

export interface SurfDocParserOptions {
  validator?: ValidatorOptions;
}
