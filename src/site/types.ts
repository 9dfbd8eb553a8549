/**
 * Types for multi-page site assembly
 */

import type { DocumentRenderer, NavEntry, OutputFormat } from '../base/Renderer.js';
import type { RendererRegistry } from '../base/RendererRegistry.js';
import type { RenderConfigInput } from '../base/RenderConfig.js';
import type { PageBlock } from '../model/types.js';

export interface AssembleOptions {
  /** Output format; ignored when `renderer` is given (default: 'html') */
  format?: OutputFormat;
  /** Explicit renderer, overrides `format` */
  renderer?: DocumentRenderer;
  /** Where `format` is looked up (default: the built-in renderers) */
  registry?: RendererRegistry;
  /** Shared by every page */
  config?: RenderConfigInput;
  /** Checked before each page is rendered */
  signal?: AbortSignal;
}

/**
 * A page in navigation order, before rendering
 */
export interface PlannedPage {
  entry: NavEntry;
  page: PageBlock;
}

export interface RenderedPage extends NavEntry {
  /** Relative output file, e.g. `docs/index.html` */
  path: string;
  content: string;
  /** Output length in characters */
  size: number;
  /** Set when `size` exceeds the configured `maxPageSize` */
  oversized: boolean;
}

export interface AssembledSite {
  name: string;
  domain?: string;
  format: OutputFormat;
  nav: NavEntry[];
  pages: RenderedPage[];
}
