/**
 * Route helpers shared by the assembler and the renderers
 */

/**
 * `/docs/` and `docs` both become `/docs`; the empty route is `/`
 */
export function normalizeRoute(route: string): string {
  const trimmed = route.trim().replace(/^\/+/, '').replace(/\/+$/, '');
  return trimmed.length === 0 ? '/' : `/${trimmed}`;
}

/**
 * Relative output path of a page, e.g. `docs/index.html`
 */
export function routeToPath(route: string, extension: string): string {
  const normalized = normalizeRoute(route);
  return normalized === '/' ? `index${extension}` : `${normalized.slice(1)}/index${extension}`;
}

/**
 * Absolute link to a page, e.g. `/docs/index.html`
 */
export function routeHref(route: string, extension = '.html'): string {
  return `/${routeToPath(route, extension)}`;
}
