/**
 * Markdown collaborators
 *
 * - Prose rendering through `marked`, with inline status and evidence markers
 * - Front matter through `yaml`
 * - Slugs and HTML escaping shared by the renderers
 *
 * @since 2026-10-18
 */

export { ProseEngine, defaultProseEngine } from './ProseEngine.js';
export { extractFrontMatter, flattenFrontMatter } from './FrontMatter.js';
export { inlineExtensionHtml, inlineExtensionTokens, matchInlineExtension, scanInlineExtensions } from './InlineExtensions.js';
export { escapeHtml, isScriptUrl } from './escape.js';
export { slugify } from './slug.js';
export type { FrontMatterResult, InlineExtension, InlineExtensionMatch, ProseEngineOptions } from './types.js';
