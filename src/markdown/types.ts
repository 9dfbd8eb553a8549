/**
 * Types for the markdown collaborators
 *
 * Prose is rendered by `marked`; front matter is read with `yaml`.
 *
 * @since 2026-10-18
 */

import type { SourcePosition } from '../base/SourceTypes.js';

/**
 * Leading `---` block split from a document
 */
export interface FrontMatterResult {
  /** Flattened key-value pairs; empty when absent or unparseable */
  data: Record<string, string>;
  /** YAML text between the delimiters, absent when there is no block */
  raw?: string;
  /** Document text after the closing delimiter */
  body: string;
  /** Position of the first body character in the original text */
  bodyStart: SourcePosition;
  /** YAML parse error message */
  error?: string;
}

export interface ProseEngineOptions {
  /** GitHub-flavoured markdown (tables, strikethrough, task lists). Default true. */
  gfm?: boolean;
  /** Escape raw HTML found in prose instead of passing it through. Default true. */
  escapeHtml?: boolean;
}

/**
 * `:evidence[...]` or `:status[...]` marker found in prose
 */
export type InlineExtension =
  | {
      kind: 'evidence';
      /** Evidence tier, when `tier` is a whole number */
      tier?: number;
      source?: string;
      /** Attribute text between the brackets */
      text: string;
    }
  | { kind: 'status'; value: string };

export interface InlineExtensionMatch {
  /** Offset of the colon */
  start: number;
  /** Offset just past the closing bracket */
  end: number;
  extension: InlineExtension;
}
