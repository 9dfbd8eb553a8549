/**
 * Site planning: page order, ids, titles and routes
 *
 * Pure functions over a `::site` block, shared by the assembler and the
 * validator so both agree on which page owns which route.
 */

import { attrText } from '../model/attributes.js';
import type { PageBlock, SiteBlock } from '../model/types.js';
import { slugify } from '../markdown/slug.js';
import { normalizeRoute } from './routes.js';
import type { PlannedPage } from './types.js';

/**
 * Pages with a numeric `order` first, ascending; the rest after them.
 * Ties and unordered pages keep document order.
 */
export function orderPages(pages: readonly PageBlock[]): PageBlock[] {
  return pages
    .map((page, index) => ({ page, index }))
    .sort((a, b) => {
      const ao = a.page.order;
      const bo = b.page.order;
      if (ao !== undefined && bo !== undefined && ao !== bo) return ao - bo;
      if (ao !== undefined && bo === undefined) return -1;
      if (ao === undefined && bo !== undefined) return 1;
      return a.index - b.index;
    })
    .map(entry => entry.page);
}

export function sitePages(site: SiteBlock): PageBlock[] {
  return orderPages(site.children.filter((node): node is PageBlock => node.kind === 'page'));
}

/**
 * Pages whose declared route is already declared by an earlier page in
 * navigation order, each with the page that keeps the route
 */
export function routeConflicts(pages: readonly PageBlock[]): { page: PageBlock; owner: PageBlock; route: string }[] {
  const owners = new Map<string, PageBlock>();
  const conflicts: { page: PageBlock; owner: PageBlock; route: string }[] = [];
  for (const page of pages) {
    if (page.route === undefined) continue;
    const route = normalizeRoute(page.route);
    const owner = owners.get(route);
    if (owner) {
      conflicts.push({ page, owner, route });
    } else {
      owners.set(route, page);
    }
  }
  return conflicts;
}

function uniqueId(candidate: string, taken: Set<string>): string {
  let id = candidate;
  for (let n = 2; taken.has(id); n++) id = `${candidate}-${n}`;
  taken.add(id);
  return id;
}

function titleFromId(id: string): string {
  return id
    .split('-')
    .filter(part => part.length > 0)
    .map(part => part[0].toUpperCase() + part.slice(1))
    .join(' ');
}

/**
 * Navigation plan: ordered pages with ids, titles and routes.
 *
 * Declared routes are reserved before any page gets a derived one, so a
 * derived route never displaces a declared one. A page declaring a route
 * that an earlier page already declared is left out.
 */
export function planSite(site: SiteBlock): PlannedPage[] {
  const pages = sitePages(site);
  const declared = new Set(
    pages.flatMap(page => (page.route === undefined ? [] : [normalizeRoute(page.route)]))
  );
  const ids = new Set<string>();
  const routes = new Set<string>();
  const planned: PlannedPage[] = [];

  pages.forEach((page, index) => {
    const base =
      attrText(page.attributes, 'id') ||
      (page.route !== undefined ? slugify(page.route) : '') ||
      (page.title !== undefined ? slugify(page.title) : '') ||
      `page-${index + 1}`;
    const id = uniqueId(base, ids);

    let route: string;
    if (page.route !== undefined) {
      route = normalizeRoute(page.route);
      if (routes.has(route)) {
        console.warn(`⚠️ Skipping page '${id}': route ${route} is already used`);
        return;
      }
    } else if (index === 0 && !declared.has('/')) {
      route = '/';
    } else {
      route = `/${id}`;
      for (let n = 2; declared.has(route) || routes.has(route); n++) route = `/${id}-${n}`;
    }
    routes.add(route);

    const title = page.title ?? (route === '/' ? 'Home' : titleFromId(id));
    planned.push({ entry: { id, title, route, position: planned.length }, page });
  });

  return planned;
}
