/**
 * Document Renderer Interface
 *
 * Common interface for every output format. Renderers are stateless and
 * deterministic: the same document and configuration always produce the
 * same string, so one instance can serve many documents concurrently.
 */

import type { DocumentNode, PageBlock, SiteBlock, SurfDocument } from '../model/types.js';
import { resolveRenderConfig } from './RenderConfig.js';
import type { RenderConfig, RenderConfigInput } from './RenderConfig.js';

export type OutputFormat = 'html' | 'markdown' | 'ansi';

/**
 * One navigation entry of an assembled site
 */
export interface NavEntry {
  id: string;
  title: string;
  route: string;
  /** 0-based position in navigation order */
  position: number;
}

/**
 * Everything a renderer needs to produce one page of a site
 */
export interface SitePageContext {
  document: SurfDocument;
  site: SiteBlock;
  page: PageBlock;
  /** Navigation entry of this page */
  entry: NavEntry;
  /** Full navigation index, in order */
  nav: readonly NavEntry[];
  /** Site display name */
  siteName: string;
}

export interface DocumentRenderer {
  /**
   * Format this renderer produces
   */
  readonly format: OutputFormat;

  /**
   * File extension for written output (e.g. '.html')
   */
  readonly extension: string;

  /**
   * Render a whole document
   *
   * @param config - Unresolved options; defaults are applied here
   */
  render(document: SurfDocument, config?: RenderConfigInput): string;

  /**
   * Render a node list without any document-level wrapping
   */
  renderNodes(nodes: readonly DocumentNode[], config: RenderConfig): string;

  /**
   * Render one page of a multi-page site
   */
  renderSitePage(context: SitePageContext, config: RenderConfig): string;
}

/**
 * Abstract base class resolving configuration once per call
 */
export abstract class BaseDocumentRenderer implements DocumentRenderer {
  abstract readonly format: OutputFormat;
  abstract readonly extension: string;

  abstract renderNodes(nodes: readonly DocumentNode[], config: RenderConfig): string;
  abstract renderSitePage(context: SitePageContext, config: RenderConfig): string;

  render(document: SurfDocument, config?: RenderConfigInput): string {
    return this.renderDocument(document, resolveRenderConfig(config));
  }

  /**
   * Default renders the nodes as they are; override to add wrapping
   */
  protected renderDocument(document: SurfDocument, config: RenderConfig): string {
    return this.renderNodes(document.nodes, config);
  }
}
