/**
 * Multi-page site assembly
 *
 * @since 2026-10-18
 */

export { SiteAssembler, assembleSite, siteName, DEFAULT_SITE_NAME } from './SiteAssembler.js';
export { orderPages, planSite, routeConflicts, sitePages } from './plan.js';
export { normalizeRoute, routeToPath, routeHref } from './routes.js';
export type { AssembleOptions, AssembledSite, PlannedPage, RenderedPage } from './types.js';
