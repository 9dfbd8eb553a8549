/**
 * Site Assembler
 *
 * Turns the first top-level `::site` block of a document into an ordered
 * set of rendered pages plus a navigation index. Pages render concurrently
 * and independently; cancellation is checked between pages.
 *
 * @since 2026-10-18
 */

import { setImmediate as yieldToEventLoop } from 'timers/promises';
import type { DocumentRenderer, NavEntry } from '../base/Renderer.js';
import { resolveRenderConfig } from '../base/RenderConfig.js';
import type { SiteBlock, SurfDocument } from '../model/types.js';
import { defaultRenderers } from '../renderers/index.js';
import { planSite } from './plan.js';
import { routeToPath } from './routes.js';
import type { AssembleOptions, AssembledSite, RenderedPage } from './types.js';

export const DEFAULT_SITE_NAME = 'SurfDoc Site';

export function siteName(site: SiteBlock, document?: SurfDocument): string {
  const property = site.properties.find(p => p.key.toLowerCase() === 'name');
  return site.name ?? property?.value ?? document?.frontMatter?.title ?? DEFAULT_SITE_NAME;
}

export class SiteAssembler {
  constructor(private readonly options: AssembleOptions = {}) {}

  async assemble(document: SurfDocument): Promise<AssembledSite> {
    const { signal } = this.options;
    signal?.throwIfAborted();

    const sites = document.nodes.filter((node): node is SiteBlock => node.kind === 'site');
    if (sites.length === 0) {
      throw new Error('Document has no ::site block to assemble');
    }
    if (sites.length > 1) {
      console.warn(`⚠️ Document has ${sites.length} site blocks; only the first is assembled`);
    }
    const site = sites[0];

    const renderer = this.resolveRenderer();
    const config = resolveRenderConfig(this.options.config);
    const name = siteName(site, document);
    const plan = planSite(site);
    const nav: NavEntry[] = plan.map(item => item.entry);

    const pages = await Promise.all(
      plan.map(async ({ entry, page }): Promise<RenderedPage> => {
        await yieldToEventLoop();
        signal?.throwIfAborted();

        const content = renderer.renderSitePage({ document, site, page, entry, nav, siteName: name }, config);
        const oversized = config.maxPageSize !== undefined && content.length > config.maxPageSize;
        if (oversized) {
          console.warn(`⚠️ Page ${entry.route} is ${content.length} characters, over the ${config.maxPageSize} limit`);
        }
        return {
          ...entry,
          path: routeToPath(entry.route, renderer.extension),
          content,
          size: content.length,
          oversized,
        };
      })
    );

    const assembled: AssembledSite = { name, format: renderer.format, nav, pages };
    if (site.domain !== undefined) assembled.domain = site.domain;
    return assembled;
  }

  private resolveRenderer(): DocumentRenderer {
    if (this.options.renderer) return this.options.renderer;
    const registry = this.options.registry ?? defaultRenderers;
    return registry.requireRenderer(this.options.format ?? 'html');
  }
}

/**
 * Assemble and render every page of the document's site
 */
export function assembleSite(document: SurfDocument, options?: AssembleOptions): Promise<AssembledSite> {
  return new SiteAssembler(options).assemble(document);
}
